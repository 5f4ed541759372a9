import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  BuilderConfig,
  buildCatalog,
  comparativeGroup,
  countCatalogTrials,
  scanSystems,
  similarityGroup,
  type AudioFile,
} from "../../src/catalog/builder.js";
import { parseCatalog } from "../../src/catalog/loader.js";
import { seededRandom } from "../../src/trials/random.js";

function files(system: string, names: string[]): AudioFile[] {
  return names.map((name) => ({ name, path: `${system}/${name}` }));
}

describe("comparativeGroup", () => {
  it("pairs same-named files in reference order up to the limit", () => {
    const systemFiles = new Map([
      ["base", files("base", ["a.wav", "b.wav", "c.wav", "d.wav"])],
      ["cand", files("cand", ["a.wav", "c.wav", "d.wav"])],
    ]);

    const group = comparativeGroup(systemFiles, { ref: "base", target: "cand" }, 3);

    expect(group?.map((t) => t.target)).toEqual(["cand/a.wav", "cand/c.wav"]);
    expect(group?.[0]).toEqual({
      type: "comparative",
      reference: "base/a.wav",
      target: "cand/a.wav",
      ref_system: "base",
      target_system: "cand",
      ref_filename: "base/a.wav",
      target_filename: "cand/a.wav",
    });
  });

  it("skips pairs with an empty system", () => {
    const systemFiles = new Map([["base", files("base", ["a.wav"])]]);
    expect(comparativeGroup(systemFiles, { ref: "base", target: "cand" }, 5)).toBeNull();
  });
});

describe("similarityGroup", () => {
  const systemFiles = new Map([
    ["spk", files("spk", ["p1.wav", "p2.wav"])],
    ["sys", files("sys", ["s1.wav", "s2.wav"])],
  ]);
  const entry = { ref: "spk", target: "sys", metalst: "meta.lst" };

  it("follows the meta list by base name", () => {
    const metaList = [
      "/data/p1.wav\ttext one\tx\t/gen/s1.wav",
      "too\tfew",
      "",
      "/data/p9.wav\ttext\tx\t/gen/s2.wav",
      "/data/p2.wav\ttext two\tx\t/gen/s2.wav",
    ].join("\n");

    const group = similarityGroup(systemFiles, entry, metaList, 10);

    expect(group?.map((t) => [t.reference, t.target, t.metalst_line])).toEqual([
      ["spk/p1.wav", "sys/s1.wav", 0],
      ["spk/p2.wav", "sys/s2.wav", 4],
    ]);
  });

  it("stops at num_pairs", () => {
    const metaList = "p1.wav\ta\tb\ts1.wav\np2.wav\ta\tb\ts2.wav\n";
    expect(similarityGroup(systemFiles, entry, metaList, 1)).toHaveLength(1);
  });
});

describe("buildCatalog", () => {
  const systemFiles = new Map([
    ["base", files("base", ["a.wav", "b.wav", "c.wav"])],
    ["cand", files("cand", ["a.wav", "b.wav", "c.wav"])],
  ]);

  it("emits a catalog the loader accepts", async () => {
    const cfg = BuilderConfig.parse({
      root_dir: "audio",
      systems: ["base", "cand"],
      tests: {
        comparative: [{ ref: "base", target: "cand" }],
        quality: [{ target: "base" }, { target: "cand" }],
      },
      num_pairs: 2,
    });

    const catalog = await buildCatalog(cfg, systemFiles, { rng: seededRandom(1) });

    expect(Object.keys(catalog)).toEqual(["comparative", "quality"]);
    expect(catalog.quality).toHaveLength(2);
    expect(catalog.quality[1].every((t) => t.system === "cand" && t.reference === null)).toBe(true);
    expect(countCatalogTrials(catalog)).toBe(6);
    expect(parseCatalog(catalog).get("quality")?.[0][0].target_system).toBe("base");
  });

  it("skips similarity entries whose meta list cannot be read", async () => {
    const cfg = BuilderConfig.parse({
      root_dir: "audio",
      systems: ["base", "cand"],
      tests: { similarity: [{ ref: "base", target: "cand", metalst: "missing.lst" }] },
    });
    const catalog = await buildCatalog(cfg, systemFiles, {
      readMetaList: async () => {
        throw new Error("ENOENT");
      },
    });
    expect(catalog).toEqual({});
  });

  it("rejects unknown test sections", () => {
    expect(
      BuilderConfig.safeParse({ root_dir: "a", systems: ["x"], tests: { ranking: [{ target: "x" }] } }).success
    ).toBe(false);
  });
});

describe("scanSystems", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "builder-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("lists audio files per system and tolerates missing directories", async () => {
    await mkdir(join(root, "base", "nested"), { recursive: true });
    await writeFile(join(root, "base", "b.WAV"), "");
    await writeFile(join(root, "base", "a.mp3"), "");
    await writeFile(join(root, "base", "notes.txt"), "");

    const found = await scanSystems(root, ["base", "absent"]);

    expect(found.get("base")).toEqual([
      { name: "a.mp3", path: "base/a.mp3" },
      { name: "b.WAV", path: "base/b.WAV" },
    ]);
    expect(found.get("absent")).toEqual([]);
  });
});

#!/usr/bin/env tsx
/**
 * Build a trial catalog from per-system audio directories
 *
 * Usage:
 *   tsx scripts/build-catalog.ts config/catalog-builder.example.yaml --out data/catalog.json
 */

import { config as loadDotenv } from "dotenv";
import { Command } from "commander";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import YAML from "yaml";
import { BuilderConfig, buildCatalog, countCatalogTrials, scanSystems } from "../src/catalog/builder.js";
import { defaultRandom, seededRandom } from "../src/trials/random.js";

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new Error(`Expected an integer, got "${value}"`);
  }
  return n;
}

async function main(): Promise<void> {
  loadDotenv();

  const program = new Command()
    .name("build-catalog")
    .description("Scan system audio directories and write a trial catalog")
    .argument("<config>", "Builder YAML config")
    .option("--out <file>", "Catalog output path", "data/catalog.json")
    .option("--num-pairs <n>", "Override num_pairs from the config", parseInteger)
    .option("--seed <n>", "Override the config seed", parseInteger)
    .parse(process.argv);

  const [configArg] = program.args;
  const opts = program.opts<{ out: string; numPairs?: number; seed?: number }>();

  const raw: unknown = YAML.parse(await readFile(resolve(configArg), "utf-8"));
  const parsed = BuilderConfig.safeParse(raw);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      console.error(`  ${issue.path.join(".")}: ${issue.message}`);
    }
    throw new Error(`Invalid builder config: ${configArg}`);
  }

  const cfg = {
    ...parsed.data,
    num_pairs: opts.numPairs ?? parsed.data.num_pairs,
    seed: opts.seed ?? parsed.data.seed,
  };

  const root = resolve(cfg.root_dir);
  console.log(`Root directory: ${root}`);

  const files = await scanSystems(root, cfg.systems);
  const rng = cfg.seed !== undefined ? seededRandom(cfg.seed) : defaultRandom;
  const catalog = await buildCatalog(cfg, files, { rng });

  const total = countCatalogTrials(catalog);
  if (total === 0) {
    console.error("No trials were generated. Check the system directories and test entries.");
    process.exit(1);
  }

  const outPath = resolve(opts.out);
  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, `${JSON.stringify(catalog, null, 2)}\n`, "utf-8");

  for (const [bucket, groups] of Object.entries(catalog)) {
    const trials = groups.reduce((sum, group) => sum + group.length, 0);
    console.log(`${bucket}: ${trials} trials across ${groups.length} groups`);
  }
  console.log(`\nWrote ${total} trials to ${outPath}`);
  console.log(`Serve audio with AUDIO_ROOT=${root}`);
}

main().catch((err: unknown) => {
  console.error("Catalog build failed:", err);
  process.exit(1);
});

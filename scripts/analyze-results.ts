#!/usr/bin/env tsx
/**
 * Offline analysis of listening test results
 *
 * Reads every *_results.json in a directory, drops participants who failed
 * an attention check and writes per-system statistics (CSV) plus
 * per-utterance statistics for reference-free tests (JSON).
 *
 * Usage:
 *   tsx scripts/analyze-results.ts results/
 *   tsx scripts/analyze-results.ts results/ --offset similarity=3 --out reports/
 */

import { config as loadDotenv } from "dotenv";
import { Command } from "commander";
import { mkdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { collectSamples, parseScoreOffset, summarizeSystems, summarizeUtterances } from "../src/analysis/aggregate.js";
import { filterByAttention, loadResultBundles } from "../src/analysis/io.js";
import { renderSummaryCsv, renderSummaryTable, renderUtteranceJson } from "../src/analysis/report.js";

async function main(): Promise<void> {
  loadDotenv();

  const program = new Command()
    .name("analyze-results")
    .description("Aggregate listening test result bundles into per-system statistics")
    .argument("<results-dir>", "Directory holding *_results.json files")
    .option("--out <dir>", "Output directory (default: the results directory)")
    .option("--offset <type=value>", "Shift a test type's means and bounds, e.g. similarity=3", parseScoreOffset, {})
    .option("--csv <name>", "Summary CSV file name", "summary.csv")
    .option("--utterances <name>", "Per-utterance JSON file name", "utterances.json")
    .parse(process.argv);

  const [resultsArg] = program.args;
  const opts = program.opts<{
    out?: string;
    offset: Record<string, number>;
    csv: string;
    utterances: string;
  }>();

  const resultsDir = resolve(resultsArg);
  const outDir = resolve(opts.out ?? resultsDir);

  const { bundles, skipped } = await loadResultBundles(resultsDir);
  if (bundles.length === 0) {
    console.error(`No result bundles found in ${resultsDir}`);
    process.exit(1);
  }

  const { kept, excluded } = filterByAttention(bundles);
  for (const file of excluded) {
    console.log(`Excluded: ${file} (failed attention checks)`);
  }

  console.log("\nFiltering summary:");
  console.log(`  Files read:     ${bundles.length + skipped.length}`);
  console.log(`  Unreadable:     ${skipped.length}`);
  console.log(`  Excluded:       ${excluded.length}`);
  console.log(`  Kept:           ${kept.length}`);

  const samples = collectSamples(kept.map((k) => k.bundle));
  const rows = summarizeSystems(samples, opts.offset);
  console.log(renderSummaryTable(rows));

  await mkdir(outDir, { recursive: true });
  const csvPath = join(outDir, opts.csv);
  const jsonPath = join(outDir, opts.utterances);
  await writeFile(csvPath, renderSummaryCsv(rows), "utf-8");
  await writeFile(jsonPath, renderUtteranceJson(summarizeUtterances(samples)), "utf-8");

  console.log(`\nWrote ${csvPath}`);
  console.log(`Wrote ${jsonPath}`);
}

main().catch((err: unknown) => {
  console.error("Analysis failed:", err);
  process.exit(1);
});

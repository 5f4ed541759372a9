/**
 * Analyzer report rendering. Returns strings; the CLI writes them.
 */

import { stringify } from "csv-stringify/sync";
import type { SystemSummary, UtteranceReport } from "./aggregate.js";

export const SUMMARY_CSV_COLUMNS = ["test_type", "system", "mean", "ci_lower", "ci_upper", "n_samples"] as const;

export function renderSummaryCsv(rows: readonly SystemSummary[]): string {
  return stringify(
    rows.map((row) => ({
      test_type: row.test_type,
      system: row.system,
      mean: row.mean,
      ci_lower: row.ci_lower ?? "",
      ci_upper: row.ci_upper ?? "",
      n_samples: row.n_samples,
    })),
    { header: true, columns: [...SUMMARY_CSV_COLUMNS] }
  );
}

export function renderUtteranceJson(report: UtteranceReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

function fmt(value: number | null): string {
  return value === null ? "N/A" : value.toFixed(3);
}

/**
 * Fixed-width console table, one block per test type
 */
export function renderSummaryTable(rows: readonly SystemSummary[]): string {
  const lines: string[] = [];
  let currentType: string | null = null;

  for (const row of rows) {
    if (row.test_type !== currentType) {
      currentType = row.test_type;
      lines.push("", currentType.toUpperCase(), "-".repeat(60));
      lines.push(`${"System".padEnd(20)} ${"Mean".padEnd(8)} ${"95% CI".padEnd(20)} N`);
      lines.push("-".repeat(60));
    }
    const ci = row.ci_lower === null ? "N/A" : `[${fmt(row.ci_lower)}, ${fmt(row.ci_upper)}]`;
    lines.push(`${row.system.padEnd(20)} ${fmt(row.mean).padEnd(8)} ${ci.padEnd(20)} ${row.n_samples}`);
  }

  return lines.join("\n");
}

/**
 * Reporter module - processing report rendering and persistence
 */

import { writeFile } from "fs/promises";
import type { ProcessingReport, QualityReport } from "../../types/data-model.js";
import { countByKind } from "../validator/findings.js";
import { writeAtomically } from "../../utils/atomic-write.js";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const RULE = "=".repeat(60);

/**
 * Serialize a report as pretty JSON (stable: same report, same bytes)
 */
export function serializeReport(report: ProcessingReport | QualityReport): string {
  return JSON.stringify(report, null, 2) + "\n";
}

/**
 * Human-readable summary for terminals
 */
export function formatReportSummary(report: ProcessingReport): string {
  const lines = [
    RULE,
    "PROCESSING REPORT",
    RULE,
    `status: ${report.status} (${report.state})`,
    `timestamp: ${report.timestamp}`,
    `input: ${report.inputPath} (${report.inputRecordCount} records)`,
    `output: ${report.outputPath} (${report.outputRecordCount} records, ${report.columnCount} columns)`,
    `duplicates removed: ${report.duplicatesRemoved}`,
    `outliers removed: ${report.outliersRemoved}`,
  ];

  const counts = Object.entries(countByKind(report.findings));
  lines.push(`findings: ${report.findings.length}`);
  for (const [kind, count] of counts) {
    lines.push(`  - ${kind}: ${count}`);
  }

  if (report.fatalErrors.length > 0) {
    lines.push("errors:");
    for (const error of report.fatalErrors) {
      lines.push(`  - [${error.code}] ${error.message} (state: ${error.state})`);
    }
  }

  lines.push(RULE);
  return lines.join("\n") + "\n";
}

/**
 * Write the JSON report; same all-or-nothing guarantee as the data sink
 */
export async function writeReport(
  report: ProcessingReport | QualityReport,
  reportPath: string,
): Promise<void> {
  try {
    await writeAtomically(reportPath, (tempPath) =>
      writeFile(tempPath, serializeReport(report), "utf8"),
    );
  } catch (error) {
    throw new FileIOError(`Failed to write report to ${reportPath}`, { reportPath }, {
      cause: error,
    });
  }
  logger.info("Report written", { reportPath });
}

import { Command } from "commander";
import { runPipeline } from "../../lib/pipeline/orchestrator.js";
import { formatReportSummary, serializeReport, writeReport } from "../../lib/reporter/index.js";
import { DEFAULT_LISTING_SCHEMA } from "../../lib/schema/default-schema.js";
import { loadRecordSchema } from "../../lib/schema/schema-loader.js";
import { toEstateEtlError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { exitCodeForReport, exitCodeForThrown } from "../exit-codes.js";
import { parseConfigFile } from "../config/parser.js";
import { mergeRunConfig, toPipelineOptions } from "../config/resolve.js";
import type { RunCommandOptions, RunConfig } from "../config/types.js";

/**
 * Run the pipeline for a merged config; resolves with the process exit code
 */
export async function executeRun(config: RunConfig): Promise<number> {
  const schema = config.schema ? await loadRecordSchema(config.schema) : DEFAULT_LISTING_SCHEMA;
  const report = await runPipeline(config.input, config.output, toPipelineOptions(config, schema));

  if (config.reportPath) {
    await writeReport(report, config.reportPath);
  }

  process.stderr.write(formatReportSummary(report));
  process.stdout.write(serializeReport(report));

  return exitCodeForReport(report);
}

/**
 * Create run command
 * @returns Commander Command
 */
export function createRunCommand(): Command {
  return new Command("run")
    .description("Extract, validate, enrich, check anomalies and load a listings file")
    .option("--input <path>", "Source file (.csv, .xlsx, .json, .ndjson)")
    .option("--output <path>", "Destination file (.csv, .json, .ndjson)")
    .option("--report-path <path>", "Where to write the JSON processing report")
    .option("--schema <path>", "Record schema file (JSON/YAML)")
    .option("--reference-now <iso>", "Reference time for age_days (default: now)")
    .option("--stop-on-critical", "Fail before enrichment on critical findings")
    .option("--dedupe", "Drop repeated ids, keeping the first (default)")
    .option("--no-dedupe", "Keep repeated ids")
    .option("--outlier-fields <fields>", "Comma-separated numeric fields for IQR checks")
    .option("--outlier-policy <policy>", "flag or remove")
    .option("--fail-on-advisory", "Fail before load on advisory findings")
    .option("--revalidate-output", "Validate the final batch again before load")
    .option("--category-basis <field>", "price_per_m2 or price")
    .option("--category-thresholds <value>", 'Price category cut points: "tertiles" or "low,high"')
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (opts: RunCommandOptions) => {
      try {
        const configFile = opts.config ? parseConfigFile(opts.config).run : undefined;
        const config = mergeRunConfig(opts, configFile);
        process.exit(await executeRun(config));
      } catch (error) {
        const failure = toEstateEtlError(error);
        logger.error("Run command error", { code: failure.code, message: failure.message });
        console.error(JSON.stringify(failure.toResponse("run"), null, 2));
        process.exit(exitCodeForThrown(failure));
      }
    });
}

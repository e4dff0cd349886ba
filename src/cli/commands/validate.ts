import { Command } from "commander";
import type { QualityReport } from "../../types/data-model.js";
import { FileLoader } from "../../lib/loader/file-loader.js";
import { serializeReport, writeReport } from "../../lib/reporter/index.js";
import { DEFAULT_LISTING_SCHEMA } from "../../lib/schema/default-schema.js";
import { loadRecordSchema } from "../../lib/schema/schema-loader.js";
import { countByKind } from "../../lib/validator/findings.js";
import { QualityValidator } from "../../lib/validator/quality-validator.js";
import { toEstateEtlError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { EXIT_QUALITY_FAILURE, EXIT_SUCCESS, exitCodeForThrown } from "../exit-codes.js";
import { parseConfigFile } from "../config/parser.js";
import { mergeValidateConfig } from "../config/resolve.js";
import type { ValidateCommandOptions, ValidateConfig } from "../config/types.js";

/**
 * Load and check a source file without enriching or writing it
 */
export async function executeValidate(
  config: ValidateConfig,
): Promise<{ report: QualityReport; exitCode: number }> {
  const schema = config.schema ? await loadRecordSchema(config.schema) : DEFAULT_LISTING_SCHEMA;
  const batch = await new FileLoader(schema).extract(config.input);
  const report = new QualityValidator(config.validator).validate(batch);

  logger.info("Validation complete", {
    passed: report.passed,
    records: report.recordsChecked,
    ...countByKind(report.findings),
  });

  if (config.reportPath) {
    await writeReport(report, config.reportPath);
  }

  return { report, exitCode: report.passed ? EXIT_SUCCESS : EXIT_QUALITY_FAILURE };
}

/**
 * Create validate command
 * @returns Commander Command
 */
export function createValidateCommand(): Command {
  return new Command("validate")
    .description("Run the quality checks on a listings file and print the findings")
    .option("--input <path>", "Source file (.csv, .xlsx, .json, .ndjson)")
    .option("--schema <path>", "Record schema file (JSON/YAML)")
    .option("--report-path <path>", "Where to write the JSON quality report")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (opts: ValidateCommandOptions) => {
      try {
        const configFile = opts.config ? parseConfigFile(opts.config).validate : undefined;
        const config = mergeValidateConfig(opts, configFile);
        const { report, exitCode } = await executeValidate(config);
        process.stdout.write(serializeReport(report));
        process.exit(exitCode);
      } catch (error) {
        const failure = toEstateEtlError(error);
        logger.error("Validate command error", { code: failure.code, message: failure.message });
        console.error(JSON.stringify(failure.toResponse("validation"), null, 2));
        process.exit(exitCodeForThrown(failure));
      }
    });
}

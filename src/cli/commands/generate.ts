import { Command } from "commander";
import { RecordBatch } from "../../lib/batch/record-batch.js";
import { FileSink } from "../../lib/emitter/file-sink.js";
import { generateSampleListings } from "../../lib/generator/sample-data.js";
import { DEFAULT_LISTING_SCHEMA } from "../../lib/schema/default-schema.js";
import { toEstateEtlError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { generateRandomSeed } from "../../utils/seed-manager.js";
import { EXIT_SUCCESS, exitCodeForThrown } from "../exit-codes.js";
import { parseConfigFile } from "../config/parser.js";
import { mergeGenerateConfig, parseReferenceNow } from "../config/resolve.js";
import type { GenerateCommandOptions, GenerateConfig } from "../config/types.js";

/**
 * Write a seeded sample listings file; resolves with the summary printed to stdout
 */
export async function executeGenerate(config: GenerateConfig) {
  const seed = config.seed ?? generateRandomSeed();
  if (config.seed === undefined) {
    logger.info("No seed given, using a random one", { seed });
  }

  const listings = generateSampleListings({
    count: config.count,
    seed,
    referenceNow: parseReferenceNow(config.referenceNow),
    nullRate: config.nullRate,
  });
  const batch = RecordBatch.fromRows(
    DEFAULT_LISTING_SCHEMA.fields.map((f) => f.name),
    listings,
  );
  await new FileSink().load(batch, config.output);

  return {
    status: "success",
    phase: "generation",
    output: {
      path: config.output,
      records: batch.size,
      seed,
    },
  };
}

/**
 * Create generate command
 * @returns Commander Command
 */
export function createGenerateCommand(): Command {
  return new Command("generate")
    .description("Generate a seeded sample listings file for trying the pipeline")
    .option("--output <path>", "Destination file (.csv, .json, .ndjson)")
    .option("--count <number>", "Number of listings to generate", (val) => parseInt(val, 10))
    .option("--seed <seed>", "Seed for deterministic generation")
    .option("--reference-now <iso>", "Publication dates fall in the year before this")
    .option("--null-rate <rate>", "Share of null descriptions, 0.0 to 1.0", (val) =>
      parseFloat(val),
    )
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (opts: GenerateCommandOptions) => {
      try {
        const configFile = opts.config ? parseConfigFile(opts.config).generate : undefined;
        const config = mergeGenerateConfig(opts, configFile);
        const result = await executeGenerate(config);
        console.log(JSON.stringify(result, null, 2));
        process.exit(EXIT_SUCCESS);
      } catch (error) {
        const failure = toEstateEtlError(error);
        logger.error("Generate command error", { code: failure.code, message: failure.message });
        console.error(JSON.stringify(failure.toResponse("generation"), null, 2));
        process.exit(exitCodeForThrown(failure));
      }
    });
}

import { Command, InvalidArgumentError } from "commander";
import { createWriteStream } from "fs";
import { pipeline } from "stream/promises";
import { DataGenerator } from "../../lib/generator/index.js";
import { createTableStream } from "../../lib/generator/stream.js";
import { createSqlDumpWriter } from "../../lib/emitter/sql-writer.js";
import { loadSchema } from "../../lib/schema/index.js";
import { isPostgresUrl, sanitizeUri } from "../../lib/introspector/connector.js";
import { FileIOError, SeedsmithError, errorMessage } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { createRandom } from "../../utils/seed-manager.js";
import { mergeCloneConfig, parseConfigFile } from "../config/parser.js";
import type { CloneCommandOptions, CloneConfig } from "../config/types.js";

export interface CloneResult {
  status: "success";
  phase: "clone";
  output: {
    path: string;
    tables: string[];
    cyclicTables: string[];
    seed: string | number;
  };
  metrics: {
    tables: number;
    rows: number;
    durationMs: number;
  };
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError("Must be a non-negative integer.");
  }
  return parsed;
}

/**
 * Load the schema, generate every table and write the dump.
 * The output file is only opened once the schema has been acquired.
 */
export async function runClone(config: CloneConfig, now?: Date): Promise<CloneResult> {
  const started = Date.now();
  const source = isPostgresUrl(config.url) ? sanitizeUri(config.url) : config.url;

  logger.info("Starting clone", { source, output: config.output, rows: config.rows });

  const tables = await loadSchema(config.url, {
    schemaName: config.schemaName,
    sampleLimit: config.sampleLimit,
  });

  const { random, seed } = createRandom(config.seed);
  const generator = new DataGenerator(tables, {
    rowCount: config.rows,
    random,
    now,
    onCycle: config.onCycle,
  });
  const { order, cyclic } = generator.resolve();

  const writer = createSqlDumpWriter({
    header: ["Seedsmith generated dump", `Source: ${source}`, `Seed: ${seed}`],
  });

  try {
    await pipeline(createTableStream(generator), writer, createWriteStream(config.output));
  } catch (error) {
    if (error instanceof SeedsmithError) throw error;
    throw new FileIOError(
      `Failed to write dump: ${config.output}`,
      { output: config.output, reason: errorMessage(error) },
      { cause: error },
    );
  }

  const stats = generator.stats(Date.now() - started);
  logger.info("Dump written", { output: config.output, tables: stats.tables, rows: stats.rows });

  return {
    status: "success",
    phase: "clone",
    output: {
      path: config.output,
      tables: order.map((table) => table.name),
      cyclicTables: cyclic,
      seed,
    },
    metrics: {
      tables: stats.tables,
      rows: stats.rows,
      durationMs: stats.durationMs,
    },
  };
}

/**
 * Create clone command
 * @returns Commander Command
 */
export function createCloneCommand(): Command {
  return new Command("clone")
    .description("Generate a synthetic, foreign-key consistent SQL dump from a database or schema file")
    .option("--url <locator>", "postgres:// URL or path to a .json/.yaml schema description")
    .option("--output <path>", "Output SQL file (default: dump.sql)")
    .option("--rows <number>", "Rows to generate per table (default: 100)", parseNonNegativeInt)
    .option("--seed <seed>", "Seed for deterministic generation")
    .option("--schema-name <name>", "Database schema to introspect (default: public)")
    .option("--sample-limit <number>", "Distinct values sampled per text column (default: 20)", parseNonNegativeInt)
    .option("--on-cycle <strategy>", "Foreign keys into tables not yet generated: append or null (default: append)")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (opts: CloneCommandOptions) => {
      try {
        const configFile = opts.config ? parseConfigFile(opts.config).clone : undefined;
        const config = mergeCloneConfig(opts, configFile);

        const result = await runClone(config);
        console.log(JSON.stringify(result, null, 2));
      } catch (error) {
        logger.error("Clone command error", error);
        const response =
          error instanceof SeedsmithError
            ? error.toResponse("clone")
            : { status: "error", phase: "clone", error: { code: "UNEXPECTED_ERROR", message: errorMessage(error) } };
        console.error(JSON.stringify(response, null, 2));
        process.exitCode = 1;
      }
    });
}

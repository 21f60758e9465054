/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { isCycleStrategy } from "../../lib/generator/types.js";
import { ConfigError, FileIOError, errorMessage } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { ajv, formatValidationErrors } from "../../utils/validation.js";
import { CLONE_DEFAULTS, type CloneCommandOptions, type CloneConfig, type SeedsmithConfig } from "./types.js";

const CONFIG_FILE_SCHEMA = {
  type: "object",
  additionalProperties: false,
  properties: {
    clone: {
      type: "object",
      additionalProperties: false,
      properties: {
        url: { type: "string", minLength: 1 },
        output: { type: "string", minLength: 1 },
        rows: { type: "integer", minimum: 0 },
        seed: { type: "string" },
        schemaName: { type: "string", minLength: 1 },
        sampleLimit: { type: "integer", minimum: 0 },
        onCycle: { type: "string", enum: ["append", "null"] },
      },
    },
  },
} as const;

const validateConfigFile = ajv.compile<SeedsmithConfig>(CONFIG_FILE_SCHEMA);

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): SeedsmithConfig {
  logger.info("Parsing configuration file", { filePath });

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, { filePath }, { cause: error });
  }

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(`Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`);
  }

  let document: unknown;
  try {
    document = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse config file: ${filePath}`,
      { reason: errorMessage(error) },
      { cause: error },
    );
  }

  // An empty YAML file parses to null
  const config = document ?? {};
  if (!validateConfigFile(config)) {
    throw new ConfigError(`Invalid config file: ${filePath}`, {
      problems: formatValidationErrors(validateConfigFile.errors),
    });
  }

  logger.info("Configuration file parsed successfully", { hasCloneConfig: !!config.clone });
  return config;
}

function requireNonNegativeInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer`, { [name]: value });
  }
  return value;
}

/**
 * Merge CLI options with config file; CLI takes precedence, then the file, then defaults
 */
export function mergeCloneConfig(options: CloneCommandOptions, configFile: Partial<CloneConfig> = {}): CloneConfig {
  const url = options.url ?? configFile.url;
  if (!url) {
    throw new ConfigError("A schema source is required: pass --url or set clone.url in the config file");
  }

  const onCycle = options.onCycle ?? configFile.onCycle ?? CLONE_DEFAULTS.onCycle;
  if (!isCycleStrategy(onCycle)) {
    throw new ConfigError(`Unknown cycle strategy: ${onCycle}. Must be append or null`, { onCycle });
  }

  const config: CloneConfig = {
    url,
    output: options.output ?? configFile.output ?? CLONE_DEFAULTS.output,
    rows: requireNonNegativeInteger("rows", options.rows ?? configFile.rows ?? CLONE_DEFAULTS.rows),
    schemaName: options.schemaName ?? configFile.schemaName ?? CLONE_DEFAULTS.schemaName,
    sampleLimit: requireNonNegativeInteger(
      "sampleLimit",
      options.sampleLimit ?? configFile.sampleLimit ?? CLONE_DEFAULTS.sampleLimit,
    ),
    onCycle,
  };

  const seed = options.seed ?? configFile.seed;
  if (seed !== undefined) {
    config.seed = seed;
  }

  return config;
}

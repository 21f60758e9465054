/**
 * CLI configuration types
 */

import type { CycleStrategy } from "../../lib/generator/types.js";

/**
 * Clone command configuration after CLI options, config file and defaults are merged
 */
export interface CloneConfig {
  /** postgres:// URL or path to a .json/.yaml/.yml schema description */
  url: string;
  output: string;
  rows: number;
  seed?: string;
  schemaName: string;
  sampleLimit: number;
  onCycle: CycleStrategy;
}

/**
 * Complete configuration file structure
 */
export interface SeedsmithConfig {
  clone?: Partial<CloneConfig>;
}

/**
 * CLI command options (from commander)
 */
export interface CloneCommandOptions {
  url?: string;
  output?: string;
  rows?: number;
  seed?: string;
  schemaName?: string;
  sampleLimit?: number;
  onCycle?: string;
  config?: string;
}

export const CLONE_DEFAULTS = {
  output: "dump.sql",
  rows: 100,
  schemaName: "public",
  sampleLimit: 20,
  onCycle: "append",
} as const satisfies Partial<CloneConfig>;

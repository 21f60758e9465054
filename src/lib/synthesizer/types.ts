/**
 * Synthesizer module types
 */

import type { Faker } from "@faker-js/faker";
import type { ReferencePool } from "../pool/index.js";

/**
 * What a foreign key receives when its referenced pool is empty or unknown:
 * "default" substitutes rowIndex + 1 or a fresh UUID, "null" emits NULL for nullable columns
 */
export type MissingReferenceStrategy = "default" | "null";

export interface SynthesizerOptions {
  random: Faker;
  pools: ReferencePool;
  /** Reference point for relative dates; defaults to the time of construction */
  now?: Date;
  onMissingReference?: MissingReferenceStrategy;
}

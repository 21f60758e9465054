/**
 * Generator module types
 */

import type { Faker } from "@faker-js/faker";
import type { SemanticType } from "../classifier/semantic-types.js";
import type { Column } from "../../types/schema-model.js";
import type { SqlLiteral } from "../../types/sql-literal.js";

/**
 * How foreign keys into tables not yet generated (cycles, forward references) are filled:
 * "append" substitutes a type-appropriate default, "null" emits NULL where the column allows it
 */
export type CycleStrategy = "append" | "null";

export const CYCLE_STRATEGIES: readonly CycleStrategy[] = ["append", "null"];

export function isCycleStrategy(value: string): value is CycleStrategy {
  return CYCLE_STRATEGIES.some((strategy) => strategy === value);
}

export interface GeneratorOptions {
  rowCount: number;
  random: Faker;
  now?: Date;
  onCycle?: CycleStrategy;
}

export interface PlannedColumn {
  column: Column;
  semantic: SemanticType;
  priority: number;
  /** Position in the table's declaration */
  index: number;
}

/**
 * Generation order and output projection for one table.
 * Row buffers are filled in generationOrder; outputProjection[i] is the buffer slot of declared column i.
 */
export interface RowPlan {
  generationOrder: readonly PlannedColumn[];
  outputProjection: readonly number[];
  /** Buffer slot of the column whose values feed the table's reference pool */
  primaryKeySlot?: number;
}

/**
 * All rows generated for one table, columns in declaration order
 */
export interface TableBlock {
  table: string;
  columns: string[];
  rows: SqlLiteral[][];
}

export interface GenerationStats {
  tables: number;
  rows: number;
  cyclicTables: string[];
  durationMs: number;
}

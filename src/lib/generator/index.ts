/**
 * Generator module - dependency-ordered row generation
 */

import type { Faker } from "@faker-js/faker";
import { SemanticClassifier } from "../classifier/index.js";
import { CONTEXT_ROLE_KEYS } from "../classifier/semantic-types.js";
import { RowContext, START_DATE_KEY, isStartLikeKey } from "../context/index.js";
import { ReferencePool } from "../pool/index.js";
import { resolveTableOrder, type ResolutionResult } from "../resolver/index.js";
import { ValueSynthesizer, parseTimestamp } from "../synthesizer/index.js";
import type { Table } from "../../types/schema-model.js";
import { literalToString, type SqlLiteral } from "../../types/sql-literal.js";
import { GenerationError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { CycleStrategy, GenerationStats, GeneratorOptions, PlannedColumn, TableBlock } from "./types.js";
import { buildRowPlan } from "./row-plan.js";

export * from "./types.js";
export * from "./row-plan.js";
export * from "./stream.js";

/**
 * Main generator class
 */
export class DataGenerator {
  private tables: readonly Table[];
  private rowCount: number;
  private random: Faker;
  private onCycle: CycleStrategy;
  private classifier = new SemanticClassifier();
  private referencePool = new ReferencePool();
  private synthesizer: ValueSynthesizer;
  private resolution?: ResolutionResult;
  private generatedRows = 0;

  constructor(tables: readonly Table[], options: GeneratorOptions) {
    if (!Number.isInteger(options.rowCount) || options.rowCount < 0) {
      throw new GenerationError("Row count must be a non-negative integer", { rowCount: options.rowCount });
    }

    this.tables = tables;
    this.rowCount = options.rowCount;
    this.random = options.random;
    this.onCycle = options.onCycle ?? "append";
    this.synthesizer = new ValueSynthesizer({
      random: this.random,
      pools: this.referencePool,
      now: options.now,
      onMissingReference: this.onCycle === "null" ? "null" : "default",
    });
  }

  get pools(): ReferencePool {
    return this.referencePool;
  }

  /**
   * Resolve the table order once per generator
   */
  resolve(): ResolutionResult {
    if (!this.resolution) {
      this.resolution = resolveTableOrder(this.tables);
    }
    return this.resolution;
  }

  /**
   * Yield one block per table in dependency order. Pools fill as tables complete,
   * so the iterator must be consumed in order.
   */
  *generate(): Generator<TableBlock> {
    const { order, cyclic } = this.resolve();
    const started = Date.now();

    logger.info("Generating rows", {
      tables: order.length,
      rowsPerTable: this.rowCount,
      onCycle: this.onCycle,
    });
    if (cyclic.length > 0) {
      logger.info("Foreign keys into unresolved tables use the cycle strategy", {
        tables: cyclic,
        strategy: this.onCycle,
      });
    }

    for (const table of order) {
      yield this.generateTable(table);
    }

    logger.info("Generation complete", {
      tables: order.length,
      rows: this.generatedRows,
      durationMs: Date.now() - started,
    });
  }

  /**
   * Generate every row of a single table and record its primary keys
   */
  generateTable(table: Table): TableBlock {
    const plan = buildRowPlan(table, this.classifier);
    const rows: SqlLiteral[][] = [];

    logger.debug("Generating table", {
      table: table.name,
      order: plan.generationOrder.map((entry) => `${entry.column.name}:${entry.semantic.category}`),
    });

    for (let rowIndex = 0; rowIndex < this.rowCount; rowIndex++) {
      const context = new RowContext();
      const buffer: SqlLiteral[] = [];

      for (const entry of plan.generationOrder) {
        const literal = this.synthesizer.synthesize(entry.semantic, entry.column, context, rowIndex);
        buffer.push(literal);
        remember(context, entry, literal);
      }

      if (plan.primaryKeySlot !== undefined) {
        const key = literalToString(buffer[plan.primaryKeySlot]);
        if (key !== undefined) {
          this.referencePool.add(table.name, key);
        }
      }

      rows.push(plan.outputProjection.map((slot) => buffer[slot]));
    }

    this.generatedRows += rows.length;

    return {
      table: table.name,
      columns: table.columns.map((column) => column.name),
      rows,
    };
  }

  /**
   * Drain the generator into memory
   */
  generateAll(): { blocks: TableBlock[]; stats: GenerationStats } {
    const started = Date.now();
    const blocks = [...this.generate()];
    return { blocks, stats: this.stats(Date.now() - started) };
  }

  stats(durationMs = 0): GenerationStats {
    return {
      tables: this.resolve().order.length,
      rows: this.generatedRows,
      cyclicTables: [...this.resolve().cyclic],
      durationMs,
    };
  }
}

/**
 * Store a generated value for later columns of the same row
 */
function remember(context: RowContext, entry: PlannedColumn, literal: SqlLiteral): void {
  const value = literalToString(literal);
  if (value === undefined) return;

  context.set(entry.column.name, value);

  const roleKey = CONTEXT_ROLE_KEYS[entry.semantic.category];
  if (roleKey !== undefined) {
    context.set(roleKey, value);
  }

  const startLike = isStartLikeKey(entry.column.name);
  if (startLike || entry.semantic.category === "start-date") {
    const date = parseTimestamp(value);
    if (date) {
      context.setDate(entry.column.name, date);
      // hired_on, joined_at and the like
      if (!startLike) context.setDate(START_DATE_KEY, date);
    }
  }
}

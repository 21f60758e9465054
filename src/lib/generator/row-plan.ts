import { generationPriority } from "../classifier/semantic-types.js";
import type { SemanticClassifier } from "../classifier/index.js";
import type { Table } from "../../types/schema-model.js";
import type { PlannedColumn, RowPlan } from "./types.js";

/**
 * Classify every column once and derive the order in which a row is filled.
 * Higher priority first; equal priorities keep declaration order.
 */
export function buildRowPlan(table: Table, classifier: SemanticClassifier): RowPlan {
  const planned: PlannedColumn[] = table.columns.map((column, index) => {
    const semantic = classifier.classify(column, table);
    return { column, semantic, priority: generationPriority(semantic.category), index };
  });

  // Array.prototype.sort is stable
  const generationOrder = [...planned].sort((a, b) => b.priority - a.priority);

  const slots = new Map<number, number>();
  generationOrder.forEach((entry, slot) => slots.set(entry.index, slot));
  const outputProjection = planned.map((entry) => slots.get(entry.index) ?? entry.index);

  return { generationOrder, outputProjection, primaryKeySlot: primaryKeySlot(table, generationOrder) };
}

function primaryKeySlot(table: Table, generationOrder: readonly PlannedColumn[]): number | undefined {
  const declared = table.primaryKey?.[0];
  const slot =
    declared !== undefined
      ? generationOrder.findIndex((entry) => entry.column.name === declared)
      : generationOrder.findIndex((entry) => entry.semantic.category === "primary-key");
  return slot >= 0 ? slot : undefined;
}

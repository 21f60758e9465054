/**
 * Dependency resolver - orders tables so referenced tables are generated first
 */

import type { Table } from "../../types/schema-model.js";
import { logger } from "../../utils/logger.js";

export interface ResolutionResult {
  /** Every input table exactly once, referenced tables before referencing ones */
  order: Table[];
  /** Tables Kahn ordering could not place; appended in input order */
  cyclic: string[];
}

/**
 * Kahn ordering over foreign-key edges (referenced -> referencing).
 * Self references and references to tables outside the input do not block resolution.
 * A cycle is not fatal: the unresolved tables are appended in their input order.
 */
export function resolveTableOrder(tables: readonly Table[]): ResolutionResult {
  const byName = new Map<string, Table>();
  for (const table of tables) {
    byName.set(table.name, table);
  }

  const successors = new Map<string, Set<string>>();
  const inDegree = new Map<string, number>();
  for (const table of tables) {
    successors.set(table.name, new Set());
    inDegree.set(table.name, 0);
  }

  for (const table of tables) {
    for (const fk of table.foreignKeys) {
      if (fk.referencedTable === table.name) continue;

      const edges = successors.get(fk.referencedTable);
      if (!edges || edges.has(table.name)) continue;

      edges.add(table.name);
      inDegree.set(table.name, (inDegree.get(table.name) ?? 0) + 1);
    }
  }

  const ready = tables.filter((t) => inDegree.get(t.name) === 0).map((t) => t.name);
  const placed = new Set<string>();
  const order: Table[] = [];

  while (ready.length > 0) {
    const name = ready.shift();
    if (name === undefined) break;

    const table = byName.get(name);
    if (!table || placed.has(name)) continue;

    placed.add(name);
    order.push(table);

    for (const next of successors.get(name) ?? []) {
      const remaining = (inDegree.get(next) ?? 0) - 1;
      inDegree.set(next, remaining);
      if (remaining === 0) {
        ready.push(next);
      }
    }
  }

  const cyclic: string[] = [];
  for (const table of tables) {
    if (!placed.has(table.name)) {
      placed.add(table.name);
      order.push(table);
      cyclic.push(table.name);
    }
  }

  if (cyclic.length > 0) {
    logger.warn("Circular foreign-key dependency detected; falling back to input order", {
      tables: cyclic,
    });
  } else {
    logger.debug("Table order resolved", { order: order.map((t) => t.name) });
  }

  return { order, cyclic };
}

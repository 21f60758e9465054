/**
 * Semantic classifier - maps a column to exactly one semantic category.
 * Pure and deterministic: the same column, table, foreign key and samples always give the same result.
 */

import {
  findForeignKey,
  isDecimalType,
  isIntegerType,
  isTemporalType,
  isTextType,
  type Column,
  type DataType,
  type ForeignKey,
  type Table,
} from "../../types/schema-model.js";
import { CATEGORY_VALUE_KINDS, type SemanticType, type SimpleCategory, type ValueKind } from "./semantic-types.js";
import { NAME_RULES, type NameRule } from "./name-rules.js";
import { inferFromSamples } from "./sample-patterns.js";
import { singularize, tokenizeName } from "./column-name.js";

export * from "./semantic-types.js";
export * from "./name-rules.js";
export * from "./sample-patterns.js";
export * from "./vocabularies.js";
export * from "./column-name.js";

/**
 * Whether a column of the given declared type can hold a value of the given kind
 */
export function isKindCompatible(kind: ValueKind, type: DataType): boolean {
  if (kind === "any") return true;
  if (isTextType(type)) return true;
  if (isIntegerType(type) || isDecimalType(type)) return kind === "integer" || kind === "numeric";
  if (isTemporalType(type)) return kind === "temporal";

  switch (type.tag) {
    case "boolean":
      return kind === "boolean";
    case "json":
      return kind === "json";
    case "array":
      return kind === "array";
    case "inet":
      return kind === "network";
    case "macaddr":
      return kind === "mac";
    case "unknown":
      return kind === "text";
    default:
      return false;
  }
}

/**
 * Primary-key naming: a declared key column, exactly "id", or "<singular table>_id"
 */
export function isPrimaryKeyColumn(column: Column, table: Table): boolean {
  if (table.primaryKey && table.primaryKey.length > 0) {
    return table.primaryKey.includes(column.name);
  }

  const name = column.name.toLowerCase();
  if (name === "id") return true;

  const tableName = table.name.toLowerCase();
  return name === `${singularize(tableName)}_id` || name === `${tableName}_id`;
}

/**
 * Classification purely from the declared type
 */
export function classifyByType(type: DataType): SimpleCategory {
  if (isIntegerType(type)) return "integer";
  if (isDecimalType(type)) return "decimal";
  if (isTemporalType(type)) return "timestamp";

  switch (type.tag) {
    case "boolean":
      return "boolean";
    case "uuid":
      return "uuid";
    case "json":
      return "json";
    case "array":
      return "array";
    case "inet":
      return "ipv4";
    case "macaddr":
      return "mac-address";
    case "bytea":
    case "unknown":
      return "unknown";
    default:
      return "text";
  }
}

/**
 * Walk the rule chain; first matching rule the declared type can hold wins
 */
export function matchNameRule(
  column: Column,
  table: Table,
  rules: readonly NameRule[] = NAME_RULES,
): NameRule | null {
  const input = { column: tokenizeName(column.name), table: tokenizeName(table.name) };

  for (const rule of rules) {
    if (!rule.matches(input)) continue;

    if (isKindCompatible(CATEGORY_VALUE_KINDS[rule.category], column.dataType)) {
      return rule;
    }
    if (rule.terminal) {
      return null;
    }
  }

  return null;
}

/**
 * Classify one column. The declared foreign key is looked up on the table when omitted;
 * pass null to classify the column as if it had none.
 */
export function classify(
  column: Column,
  table: Table,
  foreignKey: ForeignKey | null = findForeignKey(table, column.name) ?? null,
  samples: readonly string[] | undefined = column.samples,
): SemanticType {
  // 1. Declared foreign keys always win
  if (foreignKey) {
    return {
      category: "foreign-key",
      referencedTable: foreignKey.referencedTable,
      referencedColumn: foreignKey.referencedColumn,
    };
  }

  // 2. Primary-key naming convention
  if (isPrimaryKeyColumn(column, table)) {
    return { category: "primary-key" };
  }

  // 3. Sampled values
  const sampled = inferFromSamples(samples);
  if (sampled && isKindCompatible(CATEGORY_VALUE_KINDS[sampled], column.dataType)) {
    return { category: sampled };
  }

  // 4. Declared-type shortcuts
  if (column.dataType.tag === "uuid") return { category: "uuid" };
  if (column.dataType.tag === "boolean") return { category: "boolean" };

  // 5. Name rules
  const rule = matchNameRule(column, table);
  if (rule) {
    return { category: rule.category };
  }

  // 6. Declared-type fallback
  return { category: classifyByType(column.dataType) };
}

/**
 * Caches classifications per table and column; classification does not change across rows
 */
export class SemanticClassifier {
  private cache = new Map<string, SemanticType>();

  classify(column: Column, table: Table): SemanticType {
    const key = `${table.name}\u0000${column.name}`;
    const cached = this.cache.get(key);
    if (cached) return cached;

    const result = classify(column, table);
    this.cache.set(key, result);
    return result;
  }

  size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }
}

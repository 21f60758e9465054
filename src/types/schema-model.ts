/**
 * Relational schema model consumed by the generation engine
 * Loaded once (from a description file or a live catalog) and treated as read-only afterwards
 */

/**
 * Abstract type tag a declared SQL type is normalised into
 */
export type TypeTag =
  | "integer"
  | "bigint"
  | "smallint"
  | "decimal"
  | "real"
  | "boolean"
  | "text"
  | "varchar"
  | "char"
  | "date"
  | "time"
  | "timestamp"
  | "uuid"
  | "json"
  | "array"
  | "inet"
  | "macaddr"
  | "bytea"
  | "unknown";

/**
 * DataType - normalised column type plus the raw declaration it came from
 */
export interface DataType {
  tag: TypeTag;
  raw: string; // As declared, e.g. "numeric(10,2)" or "character varying"
  precision?: number;
  scale?: number;
  length?: number;
}

export interface Column {
  name: string;
  dataType: DataType;
  nullable: boolean;
  /** A few real values observed in the source, preferred over synthesis where the classifier allows */
  samples?: readonly string[];
}

export interface ForeignKey {
  column: string;
  referencedTable: string;
  referencedColumn: string;
}

export interface Table {
  name: string;
  columns: readonly Column[];
  foreignKeys: readonly ForeignKey[];
  /** Explicitly declared primary-key columns; naming conventions apply when absent */
  primaryKey?: readonly string[];
}

export type SchemaModel = readonly Table[];

const INTEGER_TAGS: ReadonlySet<TypeTag> = new Set(["integer", "bigint", "smallint"]);
const DECIMAL_TAGS: ReadonlySet<TypeTag> = new Set(["decimal", "real"]);
const TEXT_TAGS: ReadonlySet<TypeTag> = new Set(["text", "varchar", "char"]);
const TEMPORAL_TAGS: ReadonlySet<TypeTag> = new Set(["date", "time", "timestamp"]);

export function isIntegerType(type: DataType): boolean {
  return INTEGER_TAGS.has(type.tag);
}

export function isDecimalType(type: DataType): boolean {
  return DECIMAL_TAGS.has(type.tag);
}

export function isNumericType(type: DataType): boolean {
  return isIntegerType(type) || isDecimalType(type);
}

export function isTextType(type: DataType): boolean {
  return TEXT_TAGS.has(type.tag);
}

export function isTemporalType(type: DataType): boolean {
  return TEMPORAL_TAGS.has(type.tag);
}

/**
 * Find the foreign key owned by a column, if any
 */
export function findForeignKey(table: Table, columnName: string): ForeignKey | undefined {
  return table.foreignKeys.find((fk) => fk.column === columnName);
}

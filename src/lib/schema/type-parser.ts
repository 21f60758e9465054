/**
 * Normalises declared SQL type names (as written in DDL or reported by information_schema)
 * into the abstract TypeTag set
 */

import type { DataType, TypeTag } from "../../types/schema-model.js";

const TYPE_ALIASES: Readonly<Record<string, TypeTag>> = {
  integer: "integer",
  int: "integer",
  int4: "integer",
  serial: "integer",
  serial4: "integer",
  bigint: "bigint",
  int8: "bigint",
  bigserial: "bigint",
  serial8: "bigint",
  smallint: "smallint",
  int2: "smallint",
  smallserial: "smallint",
  serial2: "smallint",
  numeric: "decimal",
  decimal: "decimal",
  money: "decimal",
  real: "real",
  float4: "real",
  float8: "real",
  float: "real",
  "double precision": "real",
  boolean: "boolean",
  bool: "boolean",
  text: "text",
  citext: "text",
  name: "text",
  "character varying": "varchar",
  varchar: "varchar",
  character: "char",
  char: "char",
  bpchar: "char",
  date: "date",
  time: "time",
  timetz: "time",
  "time without time zone": "time",
  "time with time zone": "time",
  timestamp: "timestamp",
  timestamptz: "timestamp",
  "timestamp without time zone": "timestamp",
  "timestamp with time zone": "timestamp",
  uuid: "uuid",
  json: "json",
  jsonb: "json",
  array: "array",
  inet: "inet",
  cidr: "inet",
  macaddr: "macaddr",
  macaddr8: "macaddr",
  bytea: "bytea",
  "user-defined": "unknown",
};

function parseModifiers(raw: string): number[] {
  const match = /\(([^)]*)\)/.exec(raw);
  if (!match) return [];
  return match[1]
    .split(",")
    .map((part) => Number(part.trim()))
    .filter((value) => Number.isInteger(value) && value >= 0);
}

/**
 * Parse a raw type such as "numeric(10,2)", "character varying(64)", "int4" or "text[]".
 * Explicit precision, scale and length override modifiers found in the raw string.
 */
export function parseDataType(raw: string, precision?: number, scale?: number, length?: number): DataType {
  const trimmed = raw.trim();
  const lowered = trimmed.toLowerCase();

  if (lowered.endsWith("[]") || lowered.startsWith("_")) {
    return { tag: "array", raw: trimmed };
  }

  const base = lowered.replace(/\([^)]*\)/, "").replace(/\s+/g, " ").trim();
  const tag: TypeTag = Object.hasOwn(TYPE_ALIASES, base) ? TYPE_ALIASES[base] : "unknown";
  const modifiers = parseModifiers(lowered);
  const dataType: DataType = { tag, raw: trimmed };

  if (tag === "decimal") {
    const declaredPrecision = precision ?? modifiers[0];
    const declaredScale = scale ?? modifiers[1];
    if (declaredPrecision !== undefined) dataType.precision = declaredPrecision;
    if (declaredScale !== undefined) dataType.scale = declaredScale;
  } else if (tag === "varchar" || tag === "char") {
    const declaredLength = length ?? modifiers[0];
    if (declaredLength !== undefined) dataType.length = declaredLength;
  }

  return dataType;
}

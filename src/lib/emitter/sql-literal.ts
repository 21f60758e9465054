/**
 * Rendering of literals and identifiers into PostgreSQL text
 */

import type { SqlLiteral } from "../../types/sql-literal.js";

const RESERVED_WORDS: ReadonlySet<string> = new Set([
  "all",
  "and",
  "any",
  "as",
  "asc",
  "case",
  "check",
  "column",
  "constraint",
  "create",
  "default",
  "desc",
  "distinct",
  "do",
  "else",
  "end",
  "for",
  "foreign",
  "from",
  "grant",
  "group",
  "having",
  "in",
  "limit",
  "not",
  "null",
  "offset",
  "on",
  "or",
  "order",
  "primary",
  "references",
  "select",
  "table",
  "then",
  "to",
  "user",
  "using",
  "when",
  "where",
  "with",
]);

/**
 * Single quotes are doubled; nothing else needs escaping in a standard-conforming string
 */
export function escapeSqlText(value: string): string {
  return value.replace(/'/g, "''");
}

export function renderLiteral(literal: SqlLiteral): string {
  switch (literal.kind) {
    case "null":
      return "NULL";
    case "number":
      return literal.value;
    case "boolean":
      return literal.value ? "true" : "false";
    case "text":
      return `'${escapeSqlText(literal.value)}'`;
  }
}

/**
 * Lower-case simple names pass through; anything else is double-quoted
 */
export function quoteIdentifier(name: string): string {
  if (/^[a-z_][a-z0-9_]*$/.test(name) && !RESERVED_WORDS.has(name)) {
    return name;
  }
  return `"${name.replace(/"/g, '""')}"`;
}

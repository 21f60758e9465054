/**
 * SqlLiteral - a generated value before it is rendered into the dump
 */

export type SqlLiteral =
  | { kind: "null" }
  | { kind: "number"; value: string }
  | { kind: "boolean"; value: boolean }
  | { kind: "text"; value: string };

export const NULL_LITERAL: SqlLiteral = { kind: "null" };

export function numberLiteral(value: number | string): SqlLiteral {
  return { kind: "number", value: String(value) };
}

export function textLiteral(value: string): SqlLiteral {
  return { kind: "text", value };
}

export function booleanLiteral(value: boolean): SqlLiteral {
  return { kind: "boolean", value };
}

/**
 * Plain string form used by the row context and reference pools; null has none
 */
export function literalToString(literal: SqlLiteral): string | undefined {
  switch (literal.kind) {
    case "null":
      return undefined;
    case "boolean":
      return literal.value ? "true" : "false";
    case "number":
    case "text":
      return literal.value;
  }
}

/**
 * Schema description file format (JSON or YAML) and its JSON Schema
 */

export type SampleValue = string | number | boolean;

export interface ColumnDescription {
  name: string;
  type: string;
  nullable?: boolean;
  precision?: number;
  scale?: number;
  length?: number;
  samples?: SampleValue[];
}

export interface ForeignKeyDescription {
  column: string;
  referencedTable: string;
  referencedColumn: string;
}

export interface TableDescription {
  name: string;
  primaryKey?: string[];
  columns: ColumnDescription[];
  foreignKeys?: ForeignKeyDescription[];
}

export interface SchemaDescription {
  tables: TableDescription[];
}

const nonEmptyString = { type: "string", minLength: 1 } as const;
const nonNegativeInteger = { type: "integer", minimum: 0 } as const;

export const SCHEMA_DESCRIPTION_JSON_SCHEMA = {
  $id: "seedsmith/schema-description",
  type: "object",
  required: ["tables"],
  additionalProperties: false,
  properties: {
    tables: {
      type: "array",
      items: {
        type: "object",
        required: ["name", "columns"],
        additionalProperties: false,
        properties: {
          name: nonEmptyString,
          primaryKey: { type: "array", items: nonEmptyString },
          columns: {
            type: "array",
            items: {
              type: "object",
              required: ["name", "type"],
              additionalProperties: false,
              properties: {
                name: nonEmptyString,
                type: nonEmptyString,
                nullable: { type: "boolean" },
                precision: nonNegativeInteger,
                scale: nonNegativeInteger,
                length: nonNegativeInteger,
                samples: { type: "array", items: { type: ["string", "number", "boolean"] } },
              },
            },
          },
          foreignKeys: {
            type: "array",
            items: {
              type: "object",
              required: ["column", "referencedTable", "referencedColumn"],
              additionalProperties: false,
              properties: {
                column: nonEmptyString,
                referencedTable: nonEmptyString,
                referencedColumn: nonEmptyString,
              },
            },
          },
        },
      },
    },
  },
} as const;

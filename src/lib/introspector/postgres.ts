/**
 * PostgreSQL catalog introspection
 *
 * Reads tables, columns, primary and foreign keys from information_schema and samples
 * a few distinct values from text columns so the classifier can reuse real vocabularies.
 */

import type { Column, ForeignKey, SchemaModel, Table } from "../../types/schema-model.js";
import { IntrospectionError, errorMessage } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { parseDataType } from "../schema/type-parser.js";
import {
  DEFAULT_SAMPLE_LIMIT,
  DEFAULT_SCHEMA_NAME,
  type IntrospectionOptions,
  type QueryClient,
} from "./types.js";

const TABLES_QUERY = `
  SELECT table_name
  FROM information_schema.tables
  WHERE table_schema = $1 AND table_type = 'BASE TABLE'
  ORDER BY table_name`;

const COLUMNS_QUERY = `
  SELECT column_name, data_type, is_nullable, numeric_precision, numeric_scale, character_maximum_length
  FROM information_schema.columns
  WHERE table_schema = $1 AND table_name = $2
  ORDER BY ordinal_position`;

const PRIMARY_KEY_QUERY = `
  SELECT kcu.column_name
  FROM information_schema.table_constraints AS tc
  JOIN information_schema.key_column_usage AS kcu
    ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
  WHERE tc.constraint_type = 'PRIMARY KEY' AND tc.table_schema = $1 AND tc.table_name = $2
  ORDER BY kcu.ordinal_position`;

const FOREIGN_KEYS_QUERY = `
  SELECT
    kcu.column_name,
    ccu.table_name AS foreign_table_name,
    ccu.column_name AS foreign_column_name
  FROM information_schema.table_constraints AS tc
  JOIN information_schema.key_column_usage AS kcu
    ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
  JOIN information_schema.constraint_column_usage AS ccu
    ON ccu.constraint_name = tc.constraint_name AND ccu.table_schema = tc.table_schema
  WHERE tc.constraint_type = 'FOREIGN KEY' AND tc.table_schema = $1 AND tc.table_name = $2
  ORDER BY kcu.ordinal_position`;

const SAMPLE_EXCLUDED_TERMS = ["id", "email", "name"] as const;

/**
 * Always double-quoted; catalog names are used verbatim
 */
export function quoteName(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function field(row: unknown, key: string): unknown {
  if (typeof row !== "object" || row === null) return undefined;
  return new Map(Object.entries(row)).get(key);
}

function stringField(row: unknown, key: string): string {
  const value = field(row, key);
  if (typeof value !== "string") {
    throw new IntrospectionError(`Catalog row is missing "${key}"`, { row });
  }
  return value;
}

function optionalNumber(row: unknown, key: string): number | undefined {
  const value = field(row, key);
  if (typeof value === "number") return value;
  if (typeof value === "string" && /^\d+$/.test(value)) return Number(value);
  return undefined;
}

/**
 * Text-like columns whose names do not look like identifiers, emails or names
 */
export function isSampleCandidate(columnName: string, dataType: string): boolean {
  const type = dataType.toLowerCase();
  if (type !== "text" && !type.includes("char")) return false;

  const name = columnName.toLowerCase();
  return !SAMPLE_EXCLUDED_TERMS.some((term) => name.includes(term));
}

export class PostgresIntrospector {
  private client: QueryClient;
  private schemaName: string;
  private sampleLimit: number;

  constructor(client: QueryClient, options: IntrospectionOptions = {}) {
    this.client = client;
    this.schemaName = options.schemaName ?? DEFAULT_SCHEMA_NAME;
    this.sampleLimit = options.sampleLimit ?? DEFAULT_SAMPLE_LIMIT;
  }

  async introspect(): Promise<SchemaModel> {
    const tableRows = await this.catalog(TABLES_QUERY, [this.schemaName]);
    const names = tableRows.map((row) => stringField(row, "table_name"));

    logger.info("Introspecting schema", { schema: this.schemaName, tables: names.length });

    const tables: Table[] = [];
    for (const name of names) {
      tables.push(await this.introspectTable(name));
    }
    return tables;
  }

  async introspectTable(tableName: string): Promise<Table> {
    logger.debug("Analyzing table", { table: tableName });

    const columnRows = await this.catalog(COLUMNS_QUERY, [this.schemaName, tableName]);
    const columns: Column[] = [];
    for (const row of columnRows) {
      columns.push(await this.toColumn(tableName, row));
    }

    const primaryKey = (await this.catalog(PRIMARY_KEY_QUERY, [this.schemaName, tableName])).map((row) =>
      stringField(row, "column_name"),
    );

    const foreignKeys: ForeignKey[] = (
      await this.catalog(FOREIGN_KEYS_QUERY, [this.schemaName, tableName])
    ).map((row) => ({
      column: stringField(row, "column_name"),
      referencedTable: stringField(row, "foreign_table_name"),
      referencedColumn: stringField(row, "foreign_column_name"),
    }));

    const table: Table = { name: tableName, columns, foreignKeys };
    if (primaryKey.length > 0) {
      table.primaryKey = primaryKey;
    }
    return table;
  }

  private async toColumn(tableName: string, row: unknown): Promise<Column> {
    const name = stringField(row, "column_name");
    const rawType = stringField(row, "data_type");

    const column: Column = {
      name,
      dataType: parseDataType(
        rawType,
        optionalNumber(row, "numeric_precision"),
        optionalNumber(row, "numeric_scale"),
        optionalNumber(row, "character_maximum_length"),
      ),
      nullable: field(row, "is_nullable") === "YES",
    };

    if (this.sampleLimit > 0 && isSampleCandidate(name, rawType)) {
      const samples = await this.sample(tableName, name);
      if (samples.length > 0) {
        column.samples = samples;
      }
    }

    return column;
  }

  /**
   * Distinct non-null values; a failed sample query only costs the samples
   */
  async sample(tableName: string, columnName: string): Promise<string[]> {
    const column = quoteName(columnName);
    const query =
      `SELECT DISTINCT ${column} AS value FROM ${quoteName(this.schemaName)}.${quoteName(tableName)} ` +
      `WHERE ${column} IS NOT NULL LIMIT $1`;

    try {
      const result = await this.client.query(query, [this.sampleLimit]);
      return result.rows
        .map((row) => field(row, "value"))
        .filter((value): value is string => typeof value === "string");
    } catch (error) {
      logger.warn("Sampling failed; column will be synthesized", {
        table: tableName,
        column: columnName,
        reason: errorMessage(error),
      });
      return [];
    }
  }

  private async catalog(query: string, values: readonly unknown[]): Promise<unknown[]> {
    try {
      const result = await this.client.query(query, values);
      return result.rows;
    } catch (error) {
      throw new IntrospectionError("Catalog query failed", { schema: this.schemaName, reason: errorMessage(error) }, {
        cause: error,
      });
    }
  }
}

export async function introspectPostgres(client: QueryClient, options?: IntrospectionOptions): Promise<SchemaModel> {
  return new PostgresIntrospector(client, options).introspect();
}

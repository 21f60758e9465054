/**
 * Schema description loader - supports JSON and YAML
 */

import { readFile } from "fs/promises";
import { extname } from "path";
import { parse as parseYaml } from "yaml";
import type { Column, ForeignKey, SchemaModel, Table } from "../../types/schema-model.js";
import { FileIOError, SchemaLoadError, errorMessage } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { ajv, formatValidationErrors } from "../../utils/validation.js";
import {
  SCHEMA_DESCRIPTION_JSON_SCHEMA,
  type ColumnDescription,
  type SchemaDescription,
  type TableDescription,
} from "./description-schema.js";
import { parseDataType } from "./type-parser.js";

export type DescriptionFormat = "json" | "yaml";

const validateDescription = ajv.compile<SchemaDescription>(SCHEMA_DESCRIPTION_JSON_SCHEMA);

export function formatFromPath(filePath: string): DescriptionFormat | undefined {
  switch (extname(filePath).toLowerCase()) {
    case ".json":
      return "json";
    case ".yaml":
    case ".yml":
      return "yaml";
    default:
      return undefined;
  }
}

function toColumn(description: ColumnDescription): Column {
  const column: Column = {
    name: description.name,
    dataType: parseDataType(description.type, description.precision, description.scale, description.length),
    nullable: description.nullable ?? true,
  };
  if (description.samples && description.samples.length > 0) {
    column.samples = description.samples.map(String);
  }
  return column;
}

function toTable(description: TableDescription): Table {
  const columns = description.columns.map(toColumn);
  const names = new Set<string>();
  for (const column of columns) {
    if (names.has(column.name)) {
      throw new SchemaLoadError(`Duplicate column "${column.name}" in table "${description.name}"`);
    }
    names.add(column.name);
  }

  const foreignKeys: ForeignKey[] = (description.foreignKeys ?? []).map((fk) => {
    if (!names.has(fk.column)) {
      throw new SchemaLoadError(
        `Foreign key column "${fk.column}" is not a column of table "${description.name}"`,
      );
    }
    return { column: fk.column, referencedTable: fk.referencedTable, referencedColumn: fk.referencedColumn };
  });

  for (const key of description.primaryKey ?? []) {
    if (!names.has(key)) {
      throw new SchemaLoadError(`Primary key column "${key}" is not a column of table "${description.name}"`);
    }
  }

  const table: Table = { name: description.name, columns, foreignKeys };
  if (description.primaryKey && description.primaryKey.length > 0) {
    table.primaryKey = description.primaryKey;
  }
  return table;
}

/**
 * Validate a parsed document and convert it into the schema model
 */
export function toSchemaModel(document: unknown): SchemaModel {
  if (!validateDescription(document)) {
    const problems = formatValidationErrors(validateDescription.errors);
    throw new SchemaLoadError("Schema description is invalid", { problems });
  }

  const seen = new Set<string>();
  for (const table of document.tables) {
    if (seen.has(table.name)) {
      throw new SchemaLoadError(`Duplicate table "${table.name}"`);
    }
    seen.add(table.name);
  }

  return document.tables.map(toTable);
}

/**
 * Parse description text in the given format
 */
export function parseSchemaDescription(content: string, format: DescriptionFormat): SchemaModel {
  let document: unknown;
  try {
    document = format === "yaml" ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new SchemaLoadError(`Failed to parse ${format.toUpperCase()} schema description`, {
      reason: errorMessage(error),
    }, { cause: error });
  }
  return toSchemaModel(document);
}

/**
 * Load a schema description file (.json, .yaml or .yml)
 */
export async function loadSchemaFile(filePath: string): Promise<SchemaModel> {
  const format = formatFromPath(filePath);
  if (!format) {
    throw new SchemaLoadError(`Unsupported schema file format: ${filePath}. Must be .json, .yaml, or .yml`);
  }

  logger.info("Loading schema description", { filePath });

  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read schema file: ${filePath}`, { filePath }, { cause: error });
  }

  const schema = parseSchemaDescription(content, format);
  logger.info("Schema description loaded", {
    tables: schema.length,
    columns: schema.reduce((sum, table) => sum + table.columns.length, 0),
  });
  return schema;
}

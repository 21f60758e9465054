/**
 * Schema module - acquires a schema model from a description file or a database URL
 */

import type { SchemaModel } from "../../types/schema-model.js";
import { isPostgresUrl, loadSchemaFromPostgres, type IntrospectionOptions } from "../introspector/index.js";
import { loadSchemaFile } from "./schema-loader.js";

export * from "./type-parser.js";
export * from "./description-schema.js";
export * from "./schema-loader.js";

/**
 * postgres:// and postgresql:// locators are introspected; anything else is read as a description file
 */
export async function loadSchema(locator: string, options?: IntrospectionOptions): Promise<SchemaModel> {
  if (isPostgresUrl(locator)) {
    return loadSchemaFromPostgres(locator, options);
  }
  return loadSchemaFile(locator);
}

/**
 * Introspector module - reads a schema model from a live PostgreSQL database
 */

import type { SchemaModel } from "../../types/schema-model.js";
import { PostgresConnector } from "./connector.js";
import { introspectPostgres } from "./postgres.js";
import type { IntrospectionOptions } from "./types.js";

export * from "./types.js";
export * from "./connector.js";
export * from "./postgres.js";

/**
 * Connect, introspect and disconnect
 */
export async function loadSchemaFromPostgres(uri: string, options?: IntrospectionOptions): Promise<SchemaModel> {
  const connector = new PostgresConnector();
  await connector.connect(uri);
  try {
    return await introspectPostgres(connector, options);
  } finally {
    await connector.close();
  }
}

/**
 * Emitter module - renders generated table blocks as a PostgreSQL INSERT script
 */
export * from "./types.js";
export * from "./sql-literal.js";
export * from "./sql-writer.js";

// Single import point for the project's data types

export * from "./schema-model.js";
export * from "./sql-literal.js";
export type * from "../lib/synthesizer/types.js";
export type * from "../lib/generator/types.js";
export type * from "../lib/emitter/types.js";
export type * from "../lib/introspector/types.js";

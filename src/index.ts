/**
 * Seedsmith: dependency-ordered, semantics-aware synthetic data for relational schemas
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/resolver/index.js";
export * from "./lib/classifier/index.js";
export * from "./lib/context/index.js";
export * from "./lib/pool/index.js";
export * from "./lib/synthesizer/index.js";
export * from "./lib/generator/index.js";
export * from "./lib/emitter/index.js";
export * from "./lib/schema/index.js";
export * from "./lib/introspector/index.js";

// Utilities
export * from "./utils/errors.js";
export * from "./utils/logger.js";
export * from "./utils/seed-manager.js";

/**
 * schema-derive: record schemas derived from sample JSON documents
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/normalizer/index.js";
export * from "./lib/inferencer/index.js";
export * from "./lib/synthesizer/index.js";
export * from "./lib/renderer/index.js";
export * from "./lib/aggregator/index.js";
export * from "./lib/sampler/index.js";
export * from "./lib/validator/index.js";

// Utilities
export * from "./utils/errors.js";
export * from "./utils/logger.js";
export * from "./utils/config-loader.js";
export * from "./utils/value-path.js";

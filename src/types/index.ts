// Core re-exports for the schema-derive type system

export * from "./parsed-value.js";
export * from "./type-node.js";
export * from "./result.js";
export * from "./options.js";
export * from "../lib/inferencer/types.js";
export * from "../lib/renderer/types.js";
export * from "../lib/aggregator/types.js";
export * from "../lib/validator/types.js";

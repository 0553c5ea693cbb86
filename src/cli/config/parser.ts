/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { Ajv } from "ajv";
import { SchemaDeriveConfig } from "./types.js";
import { ConfigError, FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const CONFIG_SCHEMA = {
  type: "object",
  properties: {
    derive: {
      type: "object",
      properties: {
        mode: { enum: ["strict", "lenient"] },
        recordName: { type: "string", minLength: 1 },
        maxDepth: { type: "integer", minimum: 1 },
        maxSchemas: { type: "integer", minimum: 1 },
        coalesceWidening: { type: "boolean" },
      },
      additionalProperties: false,
    },
    output: {
      type: "object",
      properties: {
        pretty: { type: "boolean" },
        path: { type: "string", minLength: 1 },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

const validateConfig = new Ajv({ allErrors: true }).compile<SchemaDeriveConfig>(CONFIG_SCHEMA);

/**
 * Parse configuration text in the given format and check its shape
 */
export function parseConfigText(
  content: string,
  format: "json" | "yaml",
  source = "<inline>",
): SchemaDeriveConfig {
  let raw: unknown;
  try {
    raw = format === "yaml" ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${source}`, { source }, { cause: error });
  }

  // An empty YAML document parses to null
  const config: unknown = raw ?? {};
  if (!validateConfig(config)) {
    const problems = (validateConfig.errors ?? []).map(
      (error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`,
    );
    throw new ConfigError(`Invalid config file ${source}: ${problems.join("; ")}`, {
      source,
      problems,
    });
  }

  return config;
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): SchemaDeriveConfig {
  logger.info("Parsing configuration file", { filePath });

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  const config = parseConfigText(content, isYaml ? "yaml" : "json", filePath);

  logger.info("Configuration file parsed successfully", {
    hasDeriveConfig: config.derive !== undefined,
    hasOutputConfig: config.output !== undefined,
  });

  return config;
}

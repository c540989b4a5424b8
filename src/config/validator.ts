/**
 * Configuration validation
 */

import type { PackratConfig } from "../types";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function validateLevel(value: unknown, field: string): void {
  if (value === undefined) return;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`${field} must be a number between 0 and 9`);
  }
}

function validatePathList(value: unknown, field: string): void {
  if (!Array.isArray(value)) {
    throw new ConfigError(`${field} must be an array of paths`);
  }
  for (let i = 0; i < value.length; i++) {
    const entry: unknown = value[i];
    if (typeof entry !== "string" || entry.length === 0) {
      throw new ConfigError(`${field}[${i}] must be a non-empty string`);
    }
  }
}

const validators: Record<string, Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  sources: (c) => {
    if (c.sources === undefined) {
      throw new ConfigError("Config must have a 'sources' list");
    }
    validatePathList(c.sources, "sources");
    if (Array.isArray(c.sources) && c.sources.length === 0) {
      throw new ConfigError("Config must have at least one source");
    }
  },

  exclude: (c) => {
    if (c.exclude === undefined) return;
    validatePathList(c.exclude, "exclude");
  },

  output: (c) => {
    const output = c.output;
    if (!isRecord(output)) {
      throw new ConfigError("Config must have an 'output' section");
    }
    if (!output.path || typeof output.path !== "string") {
      throw new ConfigError("output.path must be a string");
    }
    const prefix = output.prefix;
    if (prefix !== undefined) {
      if (typeof prefix !== "string" || prefix.length === 0) {
        throw new ConfigError("output.prefix must be a non-empty string");
      }
      if (/[\\/:*?"<>|]/.test(prefix)) {
        throw new ConfigError("output.prefix must not contain path or reserved characters");
      }
    }
  },

  archive: (c) => {
    if (c.archive === undefined) return;
    const archive = c.archive;
    if (!isRecord(archive)) {
      throw new ConfigError("archive must be an object");
    }
    if (archive.format !== undefined && archive.format !== "zip" && archive.format !== "7z") {
      throw new ConfigError("archive.format must be 'zip' or '7z'");
    }
    validateLevel(archive.zipLevel, "archive.zipLevel");
    validateLevel(archive.sevenZipLevel, "archive.sevenZipLevel");
    if (archive.safetyFactor !== undefined) {
      if (typeof archive.safetyFactor !== "number" || !(archive.safetyFactor >= 1)) {
        throw new ConfigError("archive.safetyFactor must be a number >= 1");
      }
    }
  },

  compressor: (c) => {
    if (c.compressor === undefined) return;
    const compressor = c.compressor;
    if (!isRecord(compressor)) {
      throw new ConfigError("compressor must be an object");
    }
    if (compressor.path !== undefined && typeof compressor.path !== "string") {
      throw new ConfigError("compressor.path must be a string");
    }
    if (compressor.disabled !== undefined && typeof compressor.disabled !== "boolean") {
      throw new ConfigError("compressor.disabled must be a boolean");
    }
    if (compressor.timeoutSeconds !== undefined) {
      if (typeof compressor.timeoutSeconds !== "number" || !(compressor.timeoutSeconds >= 0)) {
        throw new ConfigError("compressor.timeoutSeconds must be a non-negative number");
      }
    }
  },
};

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is PackratConfig {
  if (!isRecord(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}

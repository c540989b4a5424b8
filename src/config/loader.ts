/**
 * Configuration file loading
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { PackratConfig } from "../types";
import { DEFAULT_CONFIG, deepMerge } from "./defaults";
import { resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

// Re-export inline config utilities
export {
  canRunWithoutConfigFile,
  createConfigFromInlineOptions,
  extractInlineOptions,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  type InlineValidationResult,
  mergeInlineConfig,
  validateInlineOptionsForConfigFreeMode,
} from "./inline";
export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = [
  "packrat.config.yaml",
  "packrat.config.yml",
  "packrat.config.json",
] as const;

/**
 * Load and parse a config file
 */
export async function loadConfig(configPath: string): Promise<PackratConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.promises.readFile(absolutePath, "utf8");
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    throw new ConfigError(`Failed to read config file ${absolutePath}: ${(e as Error).message}`);
  }

  const ext = path.extname(absolutePath).toLowerCase();

  // Parse file content
  const parsed = parseConfigContent(content, ext);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError("Config must be an object");
  }

  // Merge with defaults
  const merged = deepMerge<object>(DEFAULT_CONFIG, parsed);

  // Validate
  validateConfig(merged);

  // Resolve paths
  return resolvePaths(merged, absolutePath);
}

export function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${(e as Error).message}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${(e as Error).message}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    try {
      if (fs.statSync(configPath).isFile()) {
        return configPath;
      }
    } catch {
      // Not present or not accessible, try the next name
    }
  }

  return null;
}

/**
 * Find and load a config file
 */
export async function findAndLoadConfig(configPath?: string): Promise<PackratConfig> {
  if (configPath) {
    return loadConfig(configPath);
  }

  const found = findConfigFile();
  if (!found) {
    throw new ConfigError(
      "No config file found. Create packrat.config.yaml or specify --config path",
    );
  }

  return loadConfig(found);
}

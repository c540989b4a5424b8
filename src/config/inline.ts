/**
 * Inline configuration parsing and merging utilities
 */

import type { ArchiveFormat, PackratConfig } from "../types";
import { DEFAULT_CONFIG, deepMerge } from "./defaults";
import { ConfigError } from "./validator";

/**
 * Inline configuration options that can be passed via CLI flags
 */
export interface InlineConfigOptions {
  // Sources
  /** Source directories to back up (can be repeated) */
  source?: string[];
  /** Directories to leave out (can be repeated) */
  exclude?: string[];

  // Output
  /** Output directory */
  output?: string;
  /** Archive filename prefix */
  prefix?: string;

  // Archive
  /** Preferred archive format */
  format?: ArchiveFormat;
  /** Deflate level for ZIP archives (0-9) */
  zipLevel?: number;
  /** LZMA2 level for 7z archives (0-9) */
  sevenZipLevel?: number;
  /** Free-space safety factor */
  safetyFactor?: number;

  // Compressor
  /** Path to the 7-Zip executable */
  compressor?: string;
  /** Always use the in-process ZIP writer */
  noCompressor?: boolean;
  /** External compressor timeout in seconds */
  timeout?: number;
}

/**
 * Build a partial config from inline options
 */
export function buildInlineConfig(options: InlineConfigOptions): Partial<PackratConfig> {
  const config: Partial<PackratConfig> = {};

  // Handle sources and exclusions
  if (options.source && options.source.length > 0) {
    config.sources = [...options.source];
  }
  if (options.exclude && options.exclude.length > 0) {
    config.exclude = [...options.exclude];
  }

  // Handle output
  if (options.output || options.prefix) {
    config.output = {
      path: options.output ?? "",
      ...(options.prefix && { prefix: options.prefix }),
    };
  }

  // Handle archive settings
  if (
    options.format !== undefined ||
    options.zipLevel !== undefined ||
    options.sevenZipLevel !== undefined ||
    options.safetyFactor !== undefined
  ) {
    config.archive = {
      ...(options.format !== undefined && { format: options.format }),
      ...(options.zipLevel !== undefined && { zipLevel: options.zipLevel }),
      ...(options.sevenZipLevel !== undefined && { sevenZipLevel: options.sevenZipLevel }),
      ...(options.safetyFactor !== undefined && { safetyFactor: options.safetyFactor }),
    };
  }

  // Handle compressor settings
  if (options.compressor || options.noCompressor || options.timeout !== undefined) {
    config.compressor = {
      ...(options.compressor && { path: options.compressor }),
      ...(options.noCompressor && { disabled: true }),
      ...(options.timeout !== undefined && { timeoutSeconds: options.timeout }),
    };
  }

  return config;
}

/**
 * Merge inline config options into an existing config
 */
export function mergeInlineConfig(
  baseConfig: PackratConfig,
  inlineOptions: InlineConfigOptions,
): PackratConfig {
  const inlineConfig = buildInlineConfig(inlineOptions);

  // Lists replace rather than merge; an output prefix alone keeps the configured path
  if (inlineConfig.output && !inlineConfig.output.path) {
    inlineConfig.output = { ...baseConfig.output, ...inlineConfig.output, path: baseConfig.output.path };
  }

  return deepMerge(baseConfig, inlineConfig);
}

/**
 * CLI option definitions for inline config (for parseArgs)
 */
export const INLINE_CONFIG_OPTIONS = {
  // Sources
  source: { type: "string" as const, multiple: true },
  exclude: { type: "string" as const, multiple: true },

  // Output
  output: { type: "string" as const, short: "o" },
  prefix: { type: "string" as const },

  // Archive
  format: { type: "string" as const, short: "f" },
  "zip-level": { type: "string" as const },
  "7z-level": { type: "string" as const },
  "safety-factor": { type: "string" as const },

  // Compressor
  compressor: { type: "string" as const },
  "no-compressor": { type: "boolean" as const, default: false },
  timeout: { type: "string" as const },
} as const;

function parseNumberOption(value: unknown, flag: string): number | undefined {
  if (typeof value !== "string" || value.length === 0) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`--${flag} must be a number, got "${value}"`);
  }
  return parsed;
}

function parseFormatOption(value: unknown): ArchiveFormat | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "string") {
    const format = value.toLowerCase();
    if (format === "zip" || format === "7z") return format;
  }
  throw new ConfigError(`--format must be 'zip' or '7z', got "${String(value)}"`);
}

function stringList(value: unknown): string[] | undefined {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : undefined;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Extract inline config options from parsed CLI values
 */
export function extractInlineOptions(values: Record<string, unknown>): InlineConfigOptions {
  return {
    // Sources
    source: stringList(values.source),
    exclude: stringList(values.exclude),

    // Output
    output: optionalString(values.output),
    prefix: optionalString(values.prefix),

    // Archive
    format: parseFormatOption(values.format),
    zipLevel: parseNumberOption(values["zip-level"], "zip-level"),
    sevenZipLevel: parseNumberOption(values["7z-level"], "7z-level"),
    safetyFactor: parseNumberOption(values["safety-factor"], "safety-factor"),

    // Compressor
    compressor: optionalString(values.compressor),
    noCompressor: values["no-compressor"] === true,
    timeout: parseNumberOption(values.timeout, "timeout"),
  };
}

/**
 * Check if any inline config options were provided
 */
export function hasInlineOptions(options: InlineConfigOptions): boolean {
  return !!(
    (options.source && options.source.length > 0) ||
    (options.exclude && options.exclude.length > 0) ||
    options.output ||
    options.prefix ||
    options.format !== undefined ||
    options.zipLevel !== undefined ||
    options.sevenZipLevel !== undefined ||
    options.safetyFactor !== undefined ||
    options.compressor ||
    options.noCompressor ||
    options.timeout !== undefined
  );
}

/**
 * Validation result for inline options
 */
export interface InlineValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Check if inline options are sufficient to run without a config file.
 * Requires at least one --source and an --output directory.
 */
export function validateInlineOptionsForConfigFreeMode(
  options: InlineConfigOptions,
): InlineValidationResult {
  const errors: string[] = [];

  if (!options.source || options.source.length === 0) {
    errors.push("At least one --source is required when running without a config file");
  }

  if (!options.output) {
    errors.push("An --output directory is required when running without a config file");
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Check if inline options can support config-free mode
 */
export function canRunWithoutConfigFile(options: InlineConfigOptions): boolean {
  return validateInlineOptionsForConfigFreeMode(options).valid;
}

/**
 * Create a complete config from inline options only (no base config file).
 * Used when running without a config file.
 */
export function createConfigFromInlineOptions(options: InlineConfigOptions): PackratConfig {
  const validation = validateInlineOptionsForConfigFreeMode(options);
  if (!validation.valid) {
    throw new ConfigError(validation.errors.join("\n"));
  }

  const base: PackratConfig = {
    version: "1.0",
    sources: [],
    output: { path: "" },
  };

  return deepMerge(deepMerge(base, DEFAULT_CONFIG), buildInlineConfig(options));
}

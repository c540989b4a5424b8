/**
 * Build the immutable per-run settings from a validated config
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { defaultPathMatcher, type PathMatcher } from "../core/backup/path-matcher";
import type { BackupSettings, PackratConfig } from "../types";
import { logger } from "../utils/logger";
import { DEFAULT_SAFETY_FACTOR } from "./defaults";
import { ConfigError } from "./validator";

export const DEFAULT_ARCHIVE_PREFIX = "backup";

export interface SettingsOptions {
  /** Overrides the detected CPU count (used for the thread hint) */
  cpuCount?: number;
  matcher?: PathMatcher;
}

export function clampLevel(level: number | undefined, fallback: number): number {
  if (level === undefined || !Number.isFinite(level)) return fallback;
  return Math.min(Math.max(Math.trunc(level), 0), 9);
}

/**
 * Threads left to the external compressor: every core but one, at least one.
 */
export function threadHint(cpuCount: number = os.cpus().length || 4): number {
  return Math.max(1, cpuCount - 1);
}

/**
 * Report sources nested inside other sources. They are archived once per
 * root that contains them.
 */
export function findOverlappingSources(
  sources: readonly string[],
  matcher: PathMatcher = defaultPathMatcher,
): Array<[inner: string, outer: string]> {
  const overlaps: Array<[string, string]> = [];
  sources.forEach((inner, i) => {
    sources.forEach((outer, j) => {
      if (i !== j && matcher.isUnder(inner, outer)) {
        overlaps.push([inner, outer]);
      }
    });
  });
  return overlaps;
}

export async function createSettings(
  config: PackratConfig,
  options: SettingsOptions = {},
): Promise<BackupSettings> {
  const sources = config.sources.map((source) => path.resolve(source));

  for (const source of sources) {
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(source);
    } catch {
      throw new ConfigError(`Source path does not exist: ${source}`);
    }
    if (!stats.isDirectory()) {
      throw new ConfigError(`Source path is not a directory: ${source}`);
    }
  }

  for (const [inner, outer] of findOverlappingSources(sources, options.matcher)) {
    logger.warn(`Source ${inner} is inside source ${outer}; its files will be archived twice`);
  }

  const outputDir = path.resolve(config.output.path);
  try {
    await fs.promises.mkdir(outputDir, { recursive: true });
  } catch (e) {
    throw new ConfigError(`Cannot create output directory ${outputDir}: ${(e as Error).message}`);
  }

  const compressor = config.compressor ?? {};

  return Object.freeze({
    sources: Object.freeze(sources),
    excluded: Object.freeze((config.exclude ?? []).map((excluded) => path.resolve(excluded))),
    outputDir,
    prefix: config.output.prefix ?? DEFAULT_ARCHIVE_PREFIX,
    preferredFormat: config.archive?.format ?? "zip",
    zipLevel: clampLevel(config.archive?.zipLevel, 6),
    sevenZipLevel: clampLevel(config.archive?.sevenZipLevel, 7),
    threads: threadHint(options.cpuCount),
    safetyFactor: config.archive?.safetyFactor ?? DEFAULT_SAFETY_FACTOR,
    compressor: Object.freeze({
      path: compressor.path ?? "",
      disabled: compressor.disabled ?? false,
      timeoutSeconds: compressor.timeoutSeconds ?? 0,
    }),
  });
}

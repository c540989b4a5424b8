/**
 * Configuration path resolution
 */

import * as path from "node:path";
import type { PackratConfig } from "../types";

function resolveFrom(baseDir: string, target: string): string {
  return path.isAbsolute(target) ? path.normalize(target) : path.resolve(baseDir, target);
}

/**
 * Resolve relative paths in config to absolute paths, relative to the
 * directory the config file lives in.
 */
export function resolvePaths(config: PackratConfig, configPath: string): PackratConfig {
  const configDir = path.dirname(path.resolve(configPath));
  return resolvePathsFrom(config, configDir);
}

/**
 * Resolve relative paths in config against an arbitrary base directory
 */
export function resolvePathsFrom(config: PackratConfig, baseDir: string): PackratConfig {
  return {
    ...config,
    sources: config.sources.map((source) => resolveFrom(baseDir, source)),
    exclude: (config.exclude ?? []).map((excluded) => resolveFrom(baseDir, excluded)),
    output: {
      ...config.output,
      path: resolveFrom(baseDir, config.output.path),
    },
    ...(config.compressor && {
      compressor: {
        ...config.compressor,
        ...(config.compressor.path && {
          path: resolveFrom(baseDir, config.compressor.path),
        }),
      },
    }),
  };
}

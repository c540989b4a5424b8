/**
 * Default configuration values
 */

import type { PackratConfig } from "../types";

export const DEFAULT_SAFETY_FACTOR = 1.05;

export const DEFAULT_CONFIG: Partial<PackratConfig> = {
  // version and sources are intentionally NOT defaulted - they must be specified by the user
  exclude: [],
  archive: {
    format: "zip",
    zipLevel: 6,
    sevenZipLevel: 7,
    safetyFactor: DEFAULT_SAFETY_FACTOR,
  },
  compressor: {
    disabled: false,
    timeoutSeconds: 0,
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target
 */
export function deepMerge<T extends object>(target: T, source: Partial<T>): T {
  const base: object = target;
  const result: Record<string, unknown> = { ...base };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result as T;
}

/**
 * 7-Zip executable discovery
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { logger } from "../utils/logger";

export const WINDOWS_INSTALL_PATHS = [
  "C:\\Program Files\\7-Zip\\7z.exe",
  "C:\\Program Files (x86)\\7-Zip\\7z.exe",
  "C:\\Windows\\7z.exe",
] as const;

export const EXECUTABLE_NAMES = ["7z", "7zz", "7za"] as const;

/**
 * Resolves the compressor executable, or null when none is installed
 */
export type CompressorLocator = () => Promise<string | null>;

export interface LocateOptions {
  /** Configured executable, tried before anything else */
  explicitPath?: string;
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  isExecutable?: (candidate: string) => Promise<boolean>;
}

export async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(candidate);
    if (!stats.isFile()) return false;
    await fs.promises.access(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Candidate locations in lookup order: fixed install paths (Windows), then
 * each known executable name in every PATH directory.
 */
export function candidatePaths(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  const impl = platform === "win32" ? path.win32 : path.posix;
  const candidates: string[] = platform === "win32" ? [...WINDOWS_INSTALL_PATHS] : [];

  const searchPath = env.PATH ?? env.Path ?? "";
  const dirs = searchPath.split(impl.delimiter).filter((dir) => dir.length > 0);
  const names = EXECUTABLE_NAMES.map((name) => (platform === "win32" ? `${name}.exe` : name));

  for (const name of names) {
    for (const dir of dirs) {
      candidates.push(impl.join(dir, name));
    }
  }

  return candidates;
}

export async function locateCompressor(options: LocateOptions = {}): Promise<string | null> {
  const isExecutable = options.isExecutable ?? isExecutableFile;

  if (options.explicitPath) {
    if (await isExecutable(options.explicitPath)) {
      return options.explicitPath;
    }
    logger.warn(`Configured compressor is not executable: ${options.explicitPath}`);
  }

  for (const candidate of candidatePaths(options.platform, options.env)) {
    if (await isExecutable(candidate)) {
      logger.debug(`Found compressor: ${candidate}`);
      return candidate;
    }
  }

  return null;
}

export function createCompressorLocator(options: LocateOptions = {}): CompressorLocator {
  return () => locateCompressor(options);
}

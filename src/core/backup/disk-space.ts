/**
 * Pre-flight free-space check
 */

import * as fs from "node:fs";
import { formatBytes } from "../../utils/format";
import { logger } from "../../utils/logger";
import { InsufficientSpaceError } from "./errors";

/**
 * Returns the bytes available to this user at a path
 */
export type FreeSpaceProbe = (directory: string) => Promise<number>;

export const freeSpace: FreeSpaceProbe = async (directory) => {
  const stats = await fs.promises.statfs(directory);
  return stats.bavail * stats.bsize;
};

/**
 * Worst-case space needed for an archive of `neededBytes` of input
 */
export function requiredBytes(neededBytes: number, safetyFactor: number): number {
  return Math.floor(neededBytes * safetyFactor);
}

export function hasEnoughSpace(freeBytes: number, neededBytes: number, safetyFactor: number): boolean {
  return freeBytes >= requiredBytes(neededBytes, safetyFactor);
}

/**
 * Throws InsufficientSpaceError when the directory cannot hold the
 * uncompressed total times the safety factor.
 */
export async function ensureSpace(
  directory: string,
  neededBytes: number,
  safetyFactor: number,
  probe: FreeSpaceProbe = freeSpace,
): Promise<void> {
  const free = await probe(directory);
  const required = requiredBytes(neededBytes, safetyFactor);

  logger.info(`[space] Required (worst case): ${formatBytes(required)} | Free: ${formatBytes(free)}`);

  if (free < required) {
    throw new InsufficientSpaceError(required, free, directory);
  }
}

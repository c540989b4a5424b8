/**
 * Archive naming utilities
 */

import type { ArchiveFormat } from "../types";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local-time timestamp without colons, safe on every filesystem.
 */
export function safeTimestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}T${time}`;
}

export function generateArchiveName(
  prefix: string,
  format: ArchiveFormat,
  date: Date = new Date(),
  sequence: number = 0,
): string {
  const suffix = sequence > 0 ? `-${sequence}` : "";
  return `${prefix}_${safeTimestamp(date)}${suffix}.${format}`;
}

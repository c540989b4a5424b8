/**
 * JSON manifest written beside each archive
 */

import * as fs from "node:fs";
import type { ArchiveFormat, BackupSettings, ManifestRecord, ScanTotals, StrategyName } from "../../types";
import { logger } from "../../utils/logger";
import { ArchiveError } from "./errors";

export const MANIFEST_SUFFIX = ".manifest.json";

export function manifestPathFor(archivePath: string): string {
  return `${archivePath}${MANIFEST_SUFFIX}`;
}

/**
 * Local time in ISO form, to the second, without zone designator
 */
export function localIsoSeconds(date: Date = new Date()): string {
  const offsetMs = date.getTimezoneOffset() * 60_000;
  return new Date(date.getTime() - offsetMs).toISOString().slice(0, 19);
}

export interface ManifestStart {
  archivePath: string;
  format: ArchiveFormat;
  strategy: StrategyName;
  totals: ScanTotals;
  settings: BackupSettings;
  createdAt?: Date;
}

function serialize(record: Partial<ManifestRecord>): string {
  return `${JSON.stringify(record, null, 2)}\n`;
}

/**
 * Writes the manifest once when a job starts and updates it once when the
 * job succeeds. A failed or interrupted job leaves status "running".
 */
export class ManifestRecorder {
  readonly path: string;

  constructor(readonly archivePath: string) {
    this.path = manifestPathFor(archivePath);
  }

  async begin(start: Omit<ManifestStart, "archivePath">): Promise<ManifestRecord> {
    const { settings, totals } = start;
    const record: ManifestRecord = {
      output: this.archivePath,
      created_at: localIsoSeconds(start.createdAt),
      preferred_format: settings.preferredFormat,
      used_format: start.format,
      strategy: start.strategy,
      sources: [...settings.sources],
      excluded: [...settings.excluded],
      totals: { files: totals.fileCount, bytes: totals.byteCount },
      zip: { level: settings.zipLevel },
      "7z": { level: settings.sevenZipLevel },
      threads_hint: settings.threads,
      status: "running",
    };

    await fs.promises.writeFile(this.path, serialize(record), "utf8");
    logger.debug(`Manifest written: ${this.path}`);
    return record;
  }

  async complete(elapsedSeconds: number): Promise<Partial<ManifestRecord>> {
    let record: Partial<ManifestRecord> = {};
    try {
      record = parseManifest(await fs.promises.readFile(this.path, "utf8"));
    } catch (error) {
      logger.warn(`Manifest unreadable, rewriting: ${(error as Error).message}`);
    }

    record.status = "ok";
    record.elapsed_seconds = Math.round(elapsedSeconds * 100) / 100;
    try {
      record.output_size_bytes = (await fs.promises.stat(this.archivePath)).size;
    } catch (error) {
      logger.warn(`Cannot read archive size: ${(error as Error).message}`);
    }

    await fs.promises.writeFile(this.path, serialize(record), "utf8");
    return record;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check the manifest fields packrat relies on
 */
export function validateManifest(value: unknown): asserts value is ManifestRecord {
  if (!isRecord(value)) {
    throw new ArchiveError("Manifest must be a JSON object");
  }
  if (typeof value.output !== "string") {
    throw new ArchiveError("Manifest is missing 'output'");
  }
  if (value.status !== "running" && value.status !== "ok") {
    throw new ArchiveError(`Manifest has unknown status: ${String(value.status)}`);
  }
  const totals = value.totals;
  if (!isRecord(totals) || typeof totals.files !== "number" || typeof totals.bytes !== "number") {
    throw new ArchiveError("Manifest is missing 'totals'");
  }
}

export function parseManifest(content: string): ManifestRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ArchiveError(`Manifest is not valid JSON: ${(error as Error).message}`);
  }

  validateManifest(parsed);
  return parsed;
}

export async function readManifest(manifestPath: string): Promise<ManifestRecord> {
  return parseManifest(await fs.promises.readFile(manifestPath, "utf8"));
}

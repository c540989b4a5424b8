/**
 * Archive pipeline type definitions
 */

import type { ArchiveFormat } from "./config";

export type WalkEntryKind = "file" | "directory";

export interface WalkEntry {
  path: string;
  kind: WalkEntryKind;
}

/**
 * Produces a fresh, lazy walk each time it is called.
 */
export type EntrySource = () => AsyncIterable<WalkEntry>;

export interface ScanTotals {
  fileCount: number;
  byteCount: number;
}

export interface ProgressObserver {
  update(message: string): void;
}

export type StrategyName = "7z-zip" | "7z-7z" | "native-zip";

export type ManifestStatus = "running" | "ok";

/**
 * On-disk manifest record. Keys are the JSON field names.
 */
export interface ManifestRecord {
  output: string;
  created_at: string;
  preferred_format: ArchiveFormat;
  used_format: ArchiveFormat;
  strategy: StrategyName;
  sources: string[];
  excluded: string[];
  totals: { files: number; bytes: number };
  zip: { level: number };
  "7z": { level: number };
  threads_hint: number;
  status: ManifestStatus;
  elapsed_seconds?: number;
  output_size_bytes?: number;
}

export interface BackupResult {
  archivePath: string;
  manifestPath: string;
  format: ArchiveFormat;
  strategy: StrategyName;
  totals: ScanTotals;
  /** Final archive size, 0 for a dry run */
  sizeBytes: number;
  durationMs: number;
  dryRun: boolean;
}

export interface VerifyResult {
  archivePath: string;
  manifestPath: string;
  ok: boolean;
  problems: string[];
  sizeBytes: number;
  manifest: ManifestRecord | null;
  /** Entry counts read from the archive's central directory (ZIP only) */
  entries: { files: number; directories: number } | null;
}

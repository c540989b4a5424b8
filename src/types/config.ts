/**
 * Configuration type definitions for packrat
 */

export type ArchiveFormat = "zip" | "7z";

export interface OutputConfig {
  path: string;
  prefix?: string;
}

export interface ArchiveConfig {
  /** Preferred format; 7z is only produced when the external compressor is available */
  format?: ArchiveFormat;
  /** Deflate level for ZIP archives (0-9) */
  zipLevel?: number;
  /** LZMA2 level for 7z archives (0-9) */
  sevenZipLevel?: number;
  /** Multiplier applied to the scanned byte total before the free-space check */
  safetyFactor?: number;
}

export interface CompressorConfig {
  /** Explicit path to a 7-Zip executable, checked before the standard locations */
  path?: string;
  /** Never use the external compressor, always archive in-process */
  disabled?: boolean;
  /** Kill the external compressor after this many seconds (0 = no limit) */
  timeoutSeconds?: number;
}

export interface PackratConfig {
  version: string;
  sources: string[];
  exclude?: string[];
  output: OutputConfig;
  archive?: ArchiveConfig;
  compressor?: CompressorConfig;
}

/**
 * Resolved, immutable settings for a single run. Built once from a validated
 * config by `createSettings` and shared read-only by every pipeline component.
 */
export interface BackupSettings {
  readonly sources: readonly string[];
  readonly excluded: readonly string[];
  readonly outputDir: string;
  readonly prefix: string;
  readonly preferredFormat: ArchiveFormat;
  readonly zipLevel: number;
  readonly sevenZipLevel: number;
  readonly threads: number;
  readonly safetyFactor: number;
  readonly compressor: Readonly<Required<CompressorConfig>>;
}

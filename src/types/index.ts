/**
 * Centralized type exports for packrat
 */

// Backup types
export type {
  BackupResult,
  EntrySource,
  ManifestRecord,
  ManifestStatus,
  ProgressObserver,
  ScanTotals,
  StrategyName,
  VerifyResult,
  WalkEntry,
  WalkEntryKind,
} from "./backup";
// Config types
export type {
  ArchiveConfig,
  ArchiveFormat,
  BackupSettings,
  CompressorConfig,
  OutputConfig,
  PackratConfig,
} from "./config";

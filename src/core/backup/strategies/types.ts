/**
 * Archive strategy contract
 */

import type { ArchiveFormat, BackupSettings, EntrySource, StrategyName } from "../../../types";

export interface ArchiveStrategy {
  readonly name: StrategyName;
  /** Format (and file extension) of the archive this strategy writes */
  readonly format: ArchiveFormat;
  /**
   * Consume the entries in a single streaming pass and write one archive at
   * `outputPath`. Throws an `ArchiveError` on failure.
   */
  create(entries: EntrySource, settings: BackupSettings, outputPath: string): Promise<void>;
}

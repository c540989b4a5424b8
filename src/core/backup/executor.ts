/**
 * Backup execution: scan, check space, pick a strategy, write, record
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { type CompressorLocator, createCompressorLocator, type ProcessRunner } from "../../compressor";
import type {
  ArchiveFormat,
  BackupResult,
  BackupSettings,
  ProgressObserver,
  ScanTotals,
} from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import { generateArchiveName } from "../../utils/naming";
import { ensureSpace, type FreeSpaceProbe, freeSpace } from "./disk-space";
import { EmptyInputError, ToolNotFoundError } from "./errors";
import { ManifestRecorder } from "./manifest";
import { notifyObservers } from "./observers";
import type { PathMatcher } from "./path-matcher";
import {
  type ArchiveStrategy,
  NativeZipStrategy,
  SevenZip7zStrategy,
  SevenZipZipStrategy,
} from "./strategies";
import { TreeWalker } from "./tree-walker";

const SEPARATOR = "=".repeat(60);

export interface ExecutorDependencies {
  observers?: ProgressObserver[];
  /** Finds the 7-Zip executable; defaults to the configured path and standard locations */
  locateCompressor?: CompressorLocator;
  /** Runs the external compressor */
  runProcess?: ProcessRunner;
  freeSpace?: FreeSpaceProbe;
  matcher?: PathMatcher;
  /** Clock used for archive names and the manifest timestamp */
  now?: () => Date;
}

export interface ExecuteOptions {
  /** Scan, check space and choose the strategy without writing anything */
  dryRun?: boolean;
}

export class BackupExecutor {
  private readonly observers: ProgressObserver[];
  private readonly walker: TreeWalker;
  private readonly locate: CompressorLocator;
  private readonly runner: ProcessRunner | undefined;
  private readonly probe: FreeSpaceProbe;
  private readonly matcher: PathMatcher | undefined;
  private readonly now: () => Date;

  constructor(
    private readonly settings: BackupSettings,
    deps: ExecutorDependencies = {},
  ) {
    this.observers = deps.observers ?? [];
    this.matcher = deps.matcher;
    this.walker = new TreeWalker({ observers: this.observers, matcher: deps.matcher });
    this.locate =
      deps.locateCompressor ??
      createCompressorLocator({ explicitPath: settings.compressor.path || undefined });
    this.runner = deps.runProcess;
    this.probe = deps.freeSpace ?? freeSpace;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * 7-Zip when it can be found (ZIP or 7z per preference), otherwise the
   * in-process ZIP writer whatever the preference.
   */
  async pickStrategy(): Promise<ArchiveStrategy> {
    if (this.settings.compressor.disabled) {
      logger.debug("External compressor disabled, using in-process ZIP");
      return new NativeZipStrategy(this.matcher);
    }

    try {
      const tool = await this.requireCompressor();
      const options = { runner: this.runner };
      return this.settings.preferredFormat === "7z"
        ? new SevenZip7zStrategy(tool, options)
        : new SevenZipZipStrategy(tool, options);
    } catch (error) {
      if (!(error instanceof ToolNotFoundError)) throw error;
      logger.info(`${error.message}; falling back to in-process ZIP`);
      return new NativeZipStrategy(this.matcher);
    }
  }

  /**
   * First free `<prefix>_<timestamp>[-n].<ext>` path in the output directory
   */
  async resolveOutputPath(format: ArchiveFormat, date: Date = this.now()): Promise<string> {
    for (let sequence = 0; ; sequence++) {
      const candidate = path.join(
        this.settings.outputDir,
        generateArchiveName(this.settings.prefix, format, date, sequence),
      );
      const taken = await fs.promises
        .access(candidate)
        .then(() => true)
        .catch(() => false);
      if (!taken) return candidate;
    }
  }

  async execute(options: ExecuteOptions = {}): Promise<BackupResult> {
    const { settings } = this;

    this.notify(`Starting backup (${settings.preferredFormat} preferred)...`);

    const totals = await this.walker.scanTotals(settings.sources, settings.excluded);
    if (totals.fileCount === 0 || totals.byteCount === 0) {
      throw new EmptyInputError();
    }
    this.notify(`Found ${totals.fileCount} files (${formatBytes(totals.byteCount)})`);

    await ensureSpace(settings.outputDir, totals.byteCount, settings.safetyFactor, this.probe);

    const strategy = await this.pickStrategy();
    const startedAt = this.now();
    const archivePath = await this.resolveOutputPath(strategy.format, startedAt);
    const manifest = new ManifestRecorder(archivePath);

    if (options.dryRun) {
      this.notify(`[DRY RUN] Would write ${archivePath} with ${strategy.name}`);
      return this.result(archivePath, manifest.path, strategy, totals, 0, 0, true);
    }

    await manifest.begin({
      format: strategy.format,
      strategy: strategy.name,
      totals,
      settings,
      createdAt: startedAt,
    });

    const start = Date.now();
    try {
      await strategy.create(
        this.walker.source(settings.sources, settings.excluded),
        settings,
        archivePath,
      );
    } catch (error) {
      await this.removePartialArchive(archivePath);
      throw error;
    }
    const elapsedMs = Date.now() - start;

    const sizeBytes = await this.report(archivePath, totals, elapsedMs);
    await manifest.complete(elapsedMs / 1000);

    return this.result(archivePath, manifest.path, strategy, totals, sizeBytes, elapsedMs, false);
  }

  private async requireCompressor(): Promise<string> {
    const tool = await this.locate();
    if (!tool) {
      throw new ToolNotFoundError();
    }
    return tool;
  }

  private async report(archivePath: string, totals: ScanTotals, elapsedMs: number): Promise<number> {
    let sizeBytes = 0;

    this.notify(SEPARATOR);
    this.notify(`Archive: ${archivePath}`);
    try {
      sizeBytes = (await fs.promises.stat(archivePath)).size;
      this.notify(
        `Final size: ${formatBytes(sizeBytes)} (source ~${formatBytes(totals.byteCount)})`,
      );
    } catch (error) {
      logger.warn(`Cannot read archive size: ${(error as Error).message}`);
    }
    this.notify(`Duration: ${formatDuration(elapsedMs)}`);
    this.notify(SEPARATOR);

    return sizeBytes;
  }

  private async removePartialArchive(archivePath: string): Promise<void> {
    try {
      await fs.promises.rm(archivePath, { force: true });
      logger.debug(`Removed partial archive: ${archivePath}`);
    } catch (error) {
      logger.error(`Failed to remove partial archive ${archivePath}`, error);
    }
  }

  private notify(message: string): void {
    notifyObservers(this.observers, message);
  }

  private result(
    archivePath: string,
    manifestPath: string,
    strategy: ArchiveStrategy,
    totals: ScanTotals,
    sizeBytes: number,
    durationMs: number,
    dryRun: boolean,
  ): BackupResult {
    return {
      archivePath,
      manifestPath,
      format: strategy.format,
      strategy: strategy.name,
      totals,
      sizeBytes,
      durationMs,
      dryRun,
    };
  }
}

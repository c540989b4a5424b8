/**
 * Shared driver for the 7-Zip command-line strategies
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { CHARSET_FLAGS, type ListFileEncoding, writeListFile } from "../../../compressor/list-file";
import { type ProcessResult, type ProcessRunner, runProcess } from "../../../compressor/process";
import type { ArchiveFormat, BackupSettings, EntrySource, StrategyName } from "../../../types";
import { formatDuration } from "../../../utils/format";
import { logger } from "../../../utils/logger";
import { EncodingRetryableError, ExternalProcessError } from "../errors";
import type { ArchiveStrategy } from "./types";

/**
 * Output 7-Zip prints when it cannot read a line of the list file
 */
export const INVALID_LIST_ENTRY_SIGNAL = "Incorrect item in listfile";

export interface ExternalToolOptions {
  runner?: ProcessRunner;
}

export interface ListFileRun {
  /** Log prefix, e.g. "[7z ZIP]" */
  label: string;
  toolPath: string;
  outputPath: string;
  entries: EntrySource;
  buildArgs: (listFilePath: string, charsetFlag: string) => string[];
  runner: ProcessRunner;
  timeoutMs?: number;
}

/**
 * Two exclusion rules per excluded root: the absolute path, and a name
 * pattern for builds whose absolute-path matching misses entries.
 */
export function exclusionArgs(excluded: readonly string[]): string[] {
  return excluded.flatMap((ex) => [`-xr!${ex}`, `-xr!*${path.basename(ex)}*`]);
}

export function listFilePath(outputPath: string, encoding: ListFileEncoding): string {
  return `${outputPath}.${encoding}.list.txt`;
}

async function runAttempt(run: ListFileRun, encoding: ListFileEncoding): Promise<void> {
  const listFile = listFilePath(run.outputPath, encoding);

  try {
    await writeListFile(listFile, run.entries(), encoding);

    const args = run.buildArgs(listFile, CHARSET_FLAGS[encoding]);
    logger.info(`${run.label} Running: ${[run.toolPath, ...args].join(" ")}`);

    let result: ProcessResult;
    try {
      result = await run.runner(run.toolPath, args, { timeoutMs: run.timeoutMs });
    } catch (error) {
      throw new ExternalProcessError(
        `Failed to start ${run.toolPath}: ${(error as Error).message}`,
        null,
        "",
        "",
      );
    }

    if (result.exitCode === 0 && !result.timedOut) {
      return;
    }

    if (result.stdout) logger.error(result.stdout);
    if (result.stderr) logger.error(result.stderr);

    if (result.timedOut) {
      throw new ExternalProcessError(
        `7-Zip timed out after ${run.timeoutMs}ms`,
        result.exitCode,
        result.stdout,
        result.stderr,
      );
    }

    if ((result.stdout + result.stderr).includes(INVALID_LIST_ENTRY_SIGNAL)) {
      throw new EncodingRetryableError(result.exitCode, result.stdout, result.stderr);
    }

    throw new ExternalProcessError(
      `7-Zip exited with code ${result.exitCode}`,
      result.exitCode,
      result.stdout,
      result.stderr,
    );
  } finally {
    await fs.promises.rm(listFile, { force: true });
  }
}

/**
 * Write the list file as UTF-8 and run the tool. When the tool rejects a
 * list entry, rewrite the list as UTF-16LE and run it exactly once more.
 */
export async function runWithListFile(run: ListFileRun): Promise<void> {
  const start = Date.now();

  try {
    await runAttempt(run, "utf8");
  } catch (error) {
    if (!(error instanceof EncodingRetryableError)) {
      throw error;
    }

    logger.warn(`${run.label} Retrying with a UTF-16LE list file...`);
    try {
      await runAttempt(run, "utf16le");
    } catch (retryError) {
      if (retryError instanceof EncodingRetryableError) {
        throw new ExternalProcessError(
          `7-Zip exited with code ${retryError.exitCode} after the UTF-16LE retry`,
          retryError.exitCode,
          retryError.stdout,
          retryError.stderr,
        );
      }
      throw retryError;
    }
  }

  logger.info(`${run.label} OK in ${formatDuration(Date.now() - start)}`);
}

export abstract class ExternalToolStrategy implements ArchiveStrategy {
  abstract readonly name: StrategyName;
  abstract readonly format: ArchiveFormat;
  protected abstract readonly label: string;

  private readonly runner: ProcessRunner;

  constructor(
    readonly toolPath: string,
    options: ExternalToolOptions = {},
  ) {
    this.runner = options.runner ?? runProcess;
  }

  /**
   * Format, level, method and threading switches
   */
  protected abstract formatArgs(settings: BackupSettings): string[];

  buildArgs(
    settings: BackupSettings,
    outputPath: string,
    listFile: string,
    charsetFlag: string,
  ): string[] {
    return [
      "a",
      ...this.formatArgs(settings),
      charsetFlag,
      "-spf2",
      outputPath,
      `@${listFile}`,
      ...exclusionArgs(settings.excluded),
    ];
  }

  async create(entries: EntrySource, settings: BackupSettings, outputPath: string): Promise<void> {
    const timeoutSeconds = settings.compressor.timeoutSeconds;

    await runWithListFile({
      label: this.label,
      toolPath: this.toolPath,
      outputPath,
      entries,
      buildArgs: (listFile, charsetFlag) =>
        this.buildArgs(settings, outputPath, listFile, charsetFlag),
      runner: this.runner,
      timeoutMs: timeoutSeconds > 0 ? timeoutSeconds * 1000 : undefined,
    });
  }
}

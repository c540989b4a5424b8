/**
 * In-process ZIP writer, used when 7-Zip is unavailable
 */

import * as fs from "node:fs";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import archiver from "archiver";
import type { BackupSettings, EntrySource } from "../../../types";
import { formatDuration } from "../../../utils/format";
import { logger } from "../../../utils/logger";
import { archiveMemberName } from "../archive-naming";
import { ArchiveError } from "../errors";
import { defaultPathMatcher, type PathMatcher } from "../path-matcher";
import type { ArchiveStrategy } from "./types";

export const DIRECTORY_MODE = 0o775;

interface OpenedFile {
  stream: fs.ReadStream;
  stats: fs.Stats;
}

function errorCode(error: unknown): string | undefined {
  return (error as NodeJS.ErrnoException).code;
}

/**
 * Open a file for archiving. Returns null, after logging, for any entry that
 * cannot be stat'ed or opened; vanished files are only logged at debug.
 */
async function openEntryFile(filePath: string): Promise<OpenedFile | null> {
  try {
    const stats = await fs.promises.stat(filePath);
    if (!stats.isFile()) {
      logger.warn(`Skipping special file: ${filePath}`);
      return null;
    }
    const handle = await fs.promises.open(filePath, "r");
    return { stream: handle.createReadStream(), stats };
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT") {
      logger.debug(`Skipping vanished file: ${filePath}`);
      return null;
    }
    if (code === "EACCES" || code === "EPERM") {
      logger.warn(`Permission denied: ${filePath} (${(error as Error).message})`);
      return null;
    }
    logger.warn(`Skipping unreadable file: ${filePath} (${(error as Error).message})`);
    return null;
  }
}

/**
 * Queue one entry and wait until archiver has written it, so at most one
 * file is open at a time.
 */
function appendEntry(
  archive: archiver.Archiver,
  source: Readable | Buffer,
  data: archiver.EntryData,
): Promise<void> {
  return new Promise((resolve, reject) => {
    if (archive.destroyed) {
      reject(new ArchiveError(`ZIP stream closed before ${data.name} was written`));
      return;
    }

    const cleanup = () => {
      archive.off("entry", onEntry);
      archive.off("error", onError);
      archive.off("close", onClose);
    };
    const onEntry = () => {
      cleanup();
      resolve();
    };
    const onError = (error: Error) => {
      cleanup();
      reject(error);
    };
    const onClose = () => {
      cleanup();
      reject(new ArchiveError(`ZIP stream closed before ${data.name} was written`));
    };

    archive.on("entry", onEntry);
    archive.on("error", onError);
    archive.on("close", onClose);
    archive.append(source, data);
  });
}

export class NativeZipStrategy implements ArchiveStrategy {
  readonly name = "native-zip" as const;
  readonly format = "zip" as const;

  constructor(private readonly matcher: PathMatcher = defaultPathMatcher) {}

  async create(entries: EntrySource, settings: BackupSettings, outputPath: string): Promise<void> {
    const start = Date.now();
    const archive = archiver("zip", { zlib: { level: settings.zipLevel } });
    archive.on("warning", (warning: Error) => {
      logger.warn(`ZIP warning: ${warning.message}`);
    });

    let pipelineError: Error | undefined;
    const written = pipeline(archive, fs.createWriteStream(outputPath)).catch((error: Error) => {
      pipelineError = error;
    });
    let current: fs.ReadStream | undefined;
    let files = 0;

    try {
      for await (const entry of entries()) {
        const name = archiveMemberName(entry.path, entry.kind, settings.sources, this.matcher);
        if (!name) continue;

        if (entry.kind === "directory") {
          await appendEntry(archive, Buffer.alloc(0), { name, mode: DIRECTORY_MODE });
          continue;
        }

        const opened = await openEntryFile(entry.path);
        if (!opened) continue;

        current = opened.stream;
        await appendEntry(archive, opened.stream, { name, stats: opened.stats });
        current = undefined;
        files++;
      }

      await archive.finalize();
      await written;
      if (pipelineError) throw pipelineError;
    } catch (error) {
      current?.destroy();
      archive.destroy();
      await written;
      if (error instanceof ArchiveError) throw error;
      throw new ArchiveError(`Failed to write ZIP archive: ${(error as Error).message}`, {
        cause: error,
      });
    }

    logger.info(`[zip] ${files} files written in ${formatDuration(Date.now() - start)}`);
  }
}

/**
 * Lazy directory traversal with excluded-subtree pruning
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { EntrySource, ProgressObserver, ScanTotals, WalkEntry } from "../../types";
import { logger } from "../../utils/logger";
import { notifyObservers } from "./observers";
import { defaultPathMatcher, type PathMatcher } from "./path-matcher";

export const DEFAULT_PROGRESS_INTERVAL = 1000;

export interface TreeWalkerOptions {
  observers?: ProgressObserver[];
  matcher?: PathMatcher;
  /** Notify observers every this many files */
  progressInterval?: number;
}

interface DirectoryListing {
  dir: string;
  /** Child directories that survived pruning, in listing order */
  subdirs: Array<{ path: string; descend: boolean }>;
  files: string[];
}

export class TreeWalker {
  private readonly observers: ProgressObserver[];
  private readonly matcher: PathMatcher;
  private readonly progressInterval: number;

  constructor(options: TreeWalkerOptions = {}) {
    this.observers = options.observers ?? [];
    this.matcher = options.matcher ?? defaultPathMatcher;
    this.progressInterval = Math.max(1, options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL);
  }

  /**
   * Count files and bytes under the roots. Files that cannot be stat'ed are
   * left out of the totals.
   */
  async scanTotals(roots: readonly string[], excluded: readonly string[]): Promise<ScanTotals> {
    let fileCount = 0;
    let byteCount = 0;

    for (const root of roots) {
      for await (const listing of this.traverse(root, excluded)) {
        for (const file of listing.files) {
          let size: number;
          try {
            size = (await fs.promises.lstat(file)).size;
          } catch {
            continue;
          }
          fileCount++;
          byteCount += size;
        }
      }
    }

    return { fileCount, byteCount };
  }

  /**
   * Yield every root, then each non-excluded directory and file beneath it.
   * Each call starts an independent traversal.
   */
  async *walk(roots: readonly string[], excluded: readonly string[]): AsyncGenerator<WalkEntry> {
    let queued = 0;

    for (const root of roots) {
      yield { path: root, kind: "directory" };

      for await (const listing of this.traverse(root, excluded)) {
        for (const subdir of listing.subdirs) {
          yield { path: subdir.path, kind: "directory" };
        }
        for (const file of listing.files) {
          queued++;
          if (queued % this.progressInterval === 0) {
            notifyObservers(this.observers, `${queued} files queued...`);
          }
          yield { path: file, kind: "file" };
        }
      }
    }
  }

  /**
   * Bind roots and exclusions into a restartable entry source
   */
  source(roots: readonly string[], excluded: readonly string[]): EntrySource {
    return () => this.walk(roots, excluded);
  }

  isExcluded(candidate: string, excluded: readonly string[]): boolean {
    return excluded.some((ex) => this.matcher.isUnder(candidate, ex));
  }

  /**
   * Top-down pre-order traversal: a directory's listing comes before any of
   * its children's. Unreadable directories are skipped.
   */
  private async *traverse(
    root: string,
    excluded: readonly string[],
  ): AsyncGenerator<DirectoryListing> {
    const pending: string[] = [root];

    while (pending.length > 0) {
      const dir = pending.pop();
      if (dir === undefined) break;

      const listing = await this.list(dir, excluded);
      if (!listing) continue;

      yield listing;

      const descendable = listing.subdirs.filter((subdir) => subdir.descend);
      for (let i = descendable.length - 1; i >= 0; i--) {
        const next = descendable[i];
        if (next) pending.push(next.path);
      }
    }
  }

  private async list(dir: string, excluded: readonly string[]): Promise<DirectoryListing | null> {
    let dirents: fs.Dirent[];
    try {
      dirents = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      logger.debug(`Skipping unreadable directory ${dir}: ${(error as Error).message}`);
      return null;
    }

    const listing: DirectoryListing = { dir, subdirs: [], files: [] };

    for (const dirent of dirents) {
      const fullPath = path.join(dir, dirent.name);
      let isDirectory = dirent.isDirectory();
      const isLink = dirent.isSymbolicLink();

      // Links to directories are listed as directories but never followed
      if (isLink) {
        isDirectory = await fs.promises
          .stat(fullPath)
          .then((stats) => stats.isDirectory())
          .catch(() => false);
      }

      if (isDirectory) {
        if (!this.isExcluded(fullPath, excluded)) {
          listing.subdirs.push({ path: fullPath, descend: !isLink });
        }
      } else {
        listing.files.push(fullPath);
      }
    }

    return listing;
  }
}

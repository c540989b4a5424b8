import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, test, vi } from "vitest";
import { ArchiveError, ExternalProcessError } from "../../src/core/backup/errors";
import { PathMatcher } from "../../src/core/backup/path-matcher";
import {
  exclusionArgs,
  listFilePath,
  NativeZipStrategy,
  SevenZip7zStrategy,
  SevenZipZipStrategy,
} from "../../src/core/backup/strategies";
import { TreeWalker } from "../../src/core/backup/tree-walker";
import type { EntrySource, WalkEntry } from "../../src/types";
import { logger } from "../../src/utils/logger";
import { exists, makeSettings, readZip, scriptedRunner, writeTree } from "./helpers";

function fixedEntries(...entries: WalkEntry[]): EntrySource {
  return async function* () {
    yield* entries;
  };
}

describe("archive strategies", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "packrat-strategy-test-"));
  });

  afterAll(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("exclusionArgs", () => {
    test("adds a path rule and a name rule per excluded root", () => {
      expect(exclusionArgs(["/data/docs/cache", "/data/tmp"])).toEqual([
        "-xr!/data/docs/cache",
        "-xr!*cache*",
        "-xr!/data/tmp",
        "-xr!*tmp*",
      ]);
    });

    test("is empty without exclusions", () => {
      expect(exclusionArgs([])).toEqual([]);
    });
  });

  describe("external tool", () => {
    const entries = fixedEntries(
      { path: "/data/docs", kind: "directory" },
      { path: "/data/docs/a.txt", kind: "file" },
    );

    test("builds the ZIP command line", async () => {
      const outputPath = path.join(tempDir, "zip-args.zip");
      const { runner, calls } = scriptedRunner([{ exitCode: 0 }]);
      const strategy = new SevenZipZipStrategy("/usr/bin/7z", { runner });
      const settings = makeSettings({ excluded: ["/data/docs/cache"] });

      await strategy.create(entries, settings, outputPath);

      expect(calls).toHaveLength(1);
      expect(calls[0]?.command).toBe("/usr/bin/7z");
      expect(calls[0]?.args).toEqual([
        "a",
        "-tzip",
        "-mx=6",
        "-mm=Deflate",
        "-mmt=on",
        "-scsUTF-8",
        "-spf2",
        outputPath,
        `@${outputPath}.utf8.list.txt`,
        "-xr!/data/docs/cache",
        "-xr!*cache*",
      ]);
      expect(calls[0]?.options).toEqual({ timeoutMs: undefined });
      expect(calls[0]?.listContent).toBe("/data/docs\n/data/docs/a.txt\n");
    });

    test("builds the 7z command line", async () => {
      const outputPath = path.join(tempDir, "seven-args.7z");
      const { runner, calls } = scriptedRunner([{ exitCode: 0 }]);
      const strategy = new SevenZip7zStrategy("/usr/bin/7zz", { runner });

      await strategy.create(entries, makeSettings({ sevenZipLevel: 9 }), outputPath);

      expect(strategy.format).toBe("7z");
      expect(calls[0]?.args).toEqual([
        "a",
        "-t7z",
        "-mx=9",
        "-m0=LZMA2",
        "-mmt=on",
        "-ms=on",
        "-scsUTF-8",
        "-spf2",
        outputPath,
        `@${outputPath}.utf8.list.txt`,
      ]);
    });

    test("passes the configured timeout to the runner", async () => {
      const outputPath = path.join(tempDir, "timeout-args.zip");
      const { runner, calls } = scriptedRunner([{ exitCode: 0 }]);
      const settings = makeSettings({
        compressor: { path: "", disabled: false, timeoutSeconds: 30 },
      });

      await new SevenZipZipStrategy("/usr/bin/7z", { runner }).create(entries, settings, outputPath);

      expect(calls[0]?.options).toEqual({ timeoutMs: 30_000 });
    });

    test("retries once with a UTF-16LE list file and deletes both list files", async () => {
      const outputPath = path.join(tempDir, "retry.zip");
      const { runner, calls } = scriptedRunner([
        { exitCode: 2, stdout: "WARNING: Incorrect item in listfile.\nCheck listfile" },
        { exitCode: 0 },
      ]);

      await new SevenZipZipStrategy("/usr/bin/7z", { runner }).create(
        entries,
        makeSettings(),
        outputPath,
      );

      expect(calls).toHaveLength(2);
      expect(calls.map((c) => c.listFile)).toEqual([
        listFilePath(outputPath, "utf8"),
        listFilePath(outputPath, "utf16le"),
      ]);
      expect(calls[0]?.args).toContain("-scsUTF-8");
      expect(calls[1]?.args).toContain("-scsUTF-16LE");
      expect(calls[1]?.listContent).toBe("/data/docs\n/data/docs/a.txt\n");
      expect(await exists(listFilePath(outputPath, "utf8"))).toBe(false);
      expect(await exists(listFilePath(outputPath, "utf16le"))).toBe(false);
    });

    test("does not retry other failures", async () => {
      const outputPath = path.join(tempDir, "fail.zip");
      const { runner, calls } = scriptedRunner([{ exitCode: 2, stderr: "ERROR: disk write failed" }]);

      const run = new SevenZipZipStrategy("/usr/bin/7z", { runner }).create(
        entries,
        makeSettings(),
        outputPath,
      );

      await expect(run).rejects.toThrow(
        new ExternalProcessError("7-Zip exited with code 2", 2, "", "ERROR: disk write failed"),
      );
      expect(calls).toHaveLength(1);
      expect(await exists(listFilePath(outputPath, "utf8"))).toBe(false);
    });

    test("gives up after the UTF-16LE retry also fails", async () => {
      const outputPath = path.join(tempDir, "double-fail.zip");
      const signal = { exitCode: 2, stderr: "Incorrect item in listfile" };
      const { runner, calls } = scriptedRunner([signal, signal]);

      await expect(
        new SevenZipZipStrategy("/usr/bin/7z", { runner }).create(entries, makeSettings(), outputPath),
      ).rejects.toThrow("7-Zip exited with code 2 after the UTF-16LE retry");
      expect(calls).toHaveLength(2);
    });

    test("reports a timeout", async () => {
      const outputPath = path.join(tempDir, "slow.zip");
      const { runner } = scriptedRunner([{ exitCode: null, timedOut: true }]);
      const settings = makeSettings({ compressor: { path: "", disabled: false, timeoutSeconds: 1 } });

      await expect(
        new SevenZipZipStrategy("/usr/bin/7z", { runner }).create(entries, settings, outputPath),
      ).rejects.toThrow("7-Zip timed out after 1000ms");
    });

    test("wraps a failure to start the tool", async () => {
      const outputPath = path.join(tempDir, "nostart.zip");
      const { runner } = scriptedRunner([
        async () => {
          throw new Error("spawn /usr/bin/7z ENOENT");
        },
      ]);

      const run = new SevenZipZipStrategy("/usr/bin/7z", { runner }).create(
        entries,
        makeSettings(),
        outputPath,
      );

      await expect(run).rejects.toBeInstanceOf(ExternalProcessError);
      await expect(run).rejects.toThrow("Failed to start /usr/bin/7z: spawn /usr/bin/7z ENOENT");
      expect(await exists(listFilePath(outputPath, "utf8"))).toBe(false);
    });
  });

  describe("native ZIP", () => {
    let sourceDir: string;
    const matcher = new PathMatcher({ platform: "linux" });

    beforeAll(async () => {
      sourceDir = path.join(tempDir, "src");
      await writeTree(sourceDir, {
        "docs/a.txt": "0123456789",
        "docs/b.txt": "01234567890123456789",
        "docs/sub/c.txt": "nested",
        "pics/cat.txt": "meow",
      });
    });

    test("round-trips files byte for byte under their root folder", async () => {
      const docs = path.join(sourceDir, "docs");
      const outputPath = path.join(tempDir, "native.zip");
      const settings = makeSettings({ sources: [docs] });

      await new NativeZipStrategy(matcher).create(new TreeWalker().source([docs], []), settings, outputPath);

      const zip = await readZip(outputPath);
      expect([...zip.names].sort()).toEqual([
        "docs/",
        "docs/a.txt",
        "docs/b.txt",
        "docs/sub/",
        "docs/sub/c.txt",
      ]);
      expect(zip.files).toEqual({
        "docs/a.txt": "0123456789",
        "docs/b.txt": "01234567890123456789",
        "docs/sub/c.txt": "nested",
      });
    });

    test("keeps each root's folder with several roots", async () => {
      const roots = [path.join(sourceDir, "docs", "sub"), path.join(sourceDir, "pics")];
      const outputPath = path.join(tempDir, "multi.zip");

      await new NativeZipStrategy(matcher).create(
        new TreeWalker().source(roots, []),
        makeSettings({ sources: roots }),
        outputPath,
      );

      const zip = await readZip(outputPath);
      expect(zip.names).toEqual(["sub/", "sub/c.txt", "pics/", "pics/cat.txt"]);
    });

    test("leaves out excluded subtrees", async () => {
      const docs = path.join(sourceDir, "docs");
      const outputPath = path.join(tempDir, "excluded.zip");
      const excluded = [path.join(docs, "sub")];

      await new NativeZipStrategy(matcher).create(
        new TreeWalker().source([docs], excluded),
        makeSettings({ sources: [docs], excluded }),
        outputPath,
      );

      const zip = await readZip(outputPath);
      expect([...zip.names].sort()).toEqual(["docs/", "docs/a.txt", "docs/b.txt"]);
    });

    test("skips files that vanished since the scan", async () => {
      const docs = path.join(sourceDir, "docs");
      const outputPath = path.join(tempDir, "vanished.zip");

      await new NativeZipStrategy(matcher).create(
        fixedEntries(
          { path: docs, kind: "directory" },
          { path: path.join(docs, "ghost.txt"), kind: "file" },
          { path: path.join(docs, "a.txt"), kind: "file" },
        ),
        makeSettings({ sources: [docs] }),
        outputPath,
      );

      const zip = await readZip(outputPath);
      expect(zip.names).toEqual(["docs/", "docs/a.txt"]);
    });

    test("skips files it is not allowed to read", async () => {
      const docs = path.join(sourceDir, "docs");
      const blocked = path.join(docs, "b.txt");
      const outputPath = path.join(tempDir, "denied.zip");
      const realOpen = fs.promises.open;
      vi.spyOn(fs.promises, "open").mockImplementation(async (file, flags, mode) => {
        if (file === blocked) {
          throw Object.assign(new Error(`EACCES: permission denied, open '${blocked}'`), {
            code: "EACCES",
          });
        }
        return realOpen(file, flags, mode);
      });
      const warn = vi.spyOn(logger, "warn");

      await new NativeZipStrategy(matcher).create(
        fixedEntries(
          { path: docs, kind: "directory" },
          { path: blocked, kind: "file" },
          { path: path.join(docs, "a.txt"), kind: "file" },
        ),
        makeSettings({ sources: [docs] }),
        outputPath,
      );

      const zip = await readZip(outputPath);
      expect(zip.names).toEqual(["docs/", "docs/a.txt"]);
      expect(warn).toHaveBeenCalledWith(
        `Permission denied: ${blocked} (EACCES: permission denied, open '${blocked}')`,
      );
    });

    test("wraps failures in ArchiveError", async () => {
      const docs = path.join(sourceDir, "docs");
      const outputPath = path.join(tempDir, "broken-walk.zip");
      const failing: EntrySource = async function* () {
        yield { path: docs, kind: "directory" };
        throw new Error("walk failed");
      };

      await expect(
        new NativeZipStrategy(matcher).create(failing, makeSettings({ sources: [docs] }), outputPath),
      ).rejects.toThrow(new ArchiveError("Failed to write ZIP archive: walk failed"));
    });
  });
});

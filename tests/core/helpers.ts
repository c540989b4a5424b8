import * as fs from "node:fs";
import * as path from "node:path";
import * as yauzl from "yauzl-promise";
import type { ProcessResult, ProcessRunner, RunProcessOptions } from "../../src/compressor/process";
import type { BackupSettings } from "../../src/types";

export function makeSettings(overrides: Partial<BackupSettings> = {}): BackupSettings {
  return {
    sources: [],
    excluded: [],
    outputDir: "",
    prefix: "backup",
    preferredFormat: "zip",
    zipLevel: 6,
    sevenZipLevel: 7,
    threads: 3,
    safetyFactor: 1.05,
    compressor: { path: "", disabled: false, timeoutSeconds: 0 },
    ...overrides,
  };
}

export async function writeTree(baseDir: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(baseDir, relative);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, content);
  }
}

export interface RunnerCall {
  command: string;
  args: string[];
  options: RunProcessOptions | undefined;
  /** Path given after "@" */
  listFile: string;
  /** List file content, decoded with the charset the call requested */
  listContent: string;
}

/**
 * Process runner stand-in that records each call and answers from a script
 */
export function scriptedRunner(
  responses: Array<Partial<ProcessResult> | ((call: RunnerCall) => Promise<Partial<ProcessResult>>)>,
): { runner: ProcessRunner; calls: RunnerCall[] } {
  const calls: RunnerCall[] = [];

  const runner: ProcessRunner = async (command, args, options) => {
    const listArg = args.find((arg) => arg.startsWith("@")) ?? "@";
    const listFile = listArg.slice(1);
    const encoding = args.includes("-scsUTF-16LE") ? "utf16le" : "utf8";
    const listContent = listFile ? await fs.promises.readFile(listFile, encoding) : "";
    const call: RunnerCall = { command, args: [...args], options, listFile, listContent };
    calls.push(call);

    const response = responses[calls.length - 1] ?? { exitCode: 0 };
    const partial = typeof response === "function" ? await response(call) : response;
    return { exitCode: 0, stdout: "", stderr: "", timedOut: false, ...partial };
  };

  return { runner, calls };
}

export interface ZipContent {
  names: string[];
  files: Record<string, string>;
}

export async function readZip(archivePath: string): Promise<ZipContent> {
  const zip = await yauzl.open(archivePath);
  const names: string[] = [];
  const files: Record<string, string> = {};

  try {
    for await (const entry of zip) {
      names.push(entry.filename);
      if (entry.filename.endsWith("/")) continue;

      const chunks: Buffer[] = [];
      const stream = await entry.openReadStream();
      for await (const chunk of stream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
      }
      files[entry.filename] = Buffer.concat(chunks).toString("utf8");
    }
  } finally {
    await zip.close();
  }

  return { names, files };
}

export async function exists(target: string): Promise<boolean> {
  return fs.promises
    .access(target)
    .then(() => true)
    .catch(() => false);
}

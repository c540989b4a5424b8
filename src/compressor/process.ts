/**
 * Child process runner for the external compressor
 */

import { spawn } from "node:child_process";
import { logger } from "../utils/logger";

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunProcessOptions {
  /** Kill the process after this many milliseconds (0 or unset = no limit) */
  timeoutMs?: number;
  cwd?: string;
}

export type ProcessRunner = (
  command: string,
  args: readonly string[],
  options?: RunProcessOptions,
) => Promise<ProcessResult>;

/**
 * Run a command to completion with captured output. Never inherits the
 * parent's stdio. Rejects only when the process cannot be started.
 */
export const runProcess: ProcessRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    const proc = spawn(command, [...args], {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;

    if (options.timeoutMs && options.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        logger.warn(`${command} exceeded ${options.timeoutMs}ms, terminating`);
        proc.kill("SIGKILL");
      }, options.timeoutMs);
    }

    proc.stdout.setEncoding("utf8");
    proc.stderr.setEncoding("utf8");
    proc.stdout.on("data", (data: string) => {
      stdout += data;
    });
    proc.stderr.on("data", (data: string) => {
      stderr += data;
    });

    proc.on("close", (code) => {
      if (timer) clearTimeout(timer);
      resolve({ exitCode: code, stdout, stderr, timedOut });
    });

    proc.on("error", (error) => {
      if (timer) clearTimeout(timer);
      reject(error);
    });
  });

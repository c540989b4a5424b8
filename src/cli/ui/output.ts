/**
 * Styled output helpers
 */

import * as p from "@clack/prompts";
import color from "picocolors";
import pkg from "../../../package.json";
import type { ProgressObserver } from "../../types";

export { color };

export const VERSION = pkg.version;

/**
 * Display the packrat header with version and the running command
 */
export function banner(command: string): void {
  p.intro(`${color.cyan("packrat")} ${color.dim(`v${VERSION}`)} ${color.dim("·")} ${color.white(command)}`);
}

export const intro = (title: string) => p.intro(color.bgCyan(color.black(` ${title} `)));
export const outro = (message: string) => p.outro(color.green(message));
export const note = (message: string, title?: string) => p.note(message, title);

export const info = (message: string) => p.log.info(message);
export const success = (message: string) => p.log.success(message);
export const warn = (message: string) => p.log.warn(message);
export const error = (message: string) => p.log.error(message);
export const message = (message: string) => p.log.message(message);

export const spinner = p.spinner;

type Spinner = ReturnType<typeof p.spinner>;

/**
 * Shows pipeline progress as the spinner's message
 */
export class SpinnerProgressObserver implements ProgressObserver {
  constructor(private readonly spin: Spinner) {}

  update(text: string): void {
    // Separator lines only frame the log output
    if (/^=+$/.test(text)) return;
    this.spin.message(text);
  }
}

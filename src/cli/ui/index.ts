/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters";
// Formatters
export { formatSummary } from "./formatters";
// Output
export {
  banner,
  color,
  error,
  info,
  intro,
  message,
  note,
  outro,
  SpinnerProgressObserver,
  spinner,
  success,
  VERSION,
  warn,
} from "./output";

import * as output from "./output";

export const ui = {
  intro: output.intro,
  outro: output.outro,
  note: output.note,
  info: output.info,
  success: output.success,
  warn: output.warn,
  error: output.error,
  message: output.message,
  spinner: output.spinner,
};

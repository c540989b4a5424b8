/**
 * Archive strategies
 */

export {
  ExternalToolStrategy,
  exclusionArgs,
  INVALID_LIST_ENTRY_SIGNAL,
  listFilePath,
  runWithListFile,
  type ExternalToolOptions,
  type ListFileRun,
} from "./external-tool";
export { DIRECTORY_MODE, NativeZipStrategy } from "./native-zip";
export { SevenZip7zStrategy, SevenZipZipStrategy } from "./seven-zip";
export type { ArchiveStrategy } from "./types";

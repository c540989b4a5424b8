/**
 * Backup module exports
 */

export { archiveMemberName } from "./archive-naming";
export {
  ensureSpace,
  type FreeSpaceProbe,
  freeSpace,
  hasEnoughSpace,
  requiredBytes,
} from "./disk-space";
export {
  ArchiveError,
  EmptyInputError,
  EncodingRetryableError,
  ExternalProcessError,
  InsufficientSpaceError,
  ToolNotFoundError,
} from "./errors";
export {
  BackupExecutor,
  type ExecuteOptions,
  type ExecutorDependencies,
} from "./executor";
export {
  localIsoSeconds,
  MANIFEST_SUFFIX,
  ManifestRecorder,
  manifestPathFor,
  parseManifest,
  readManifest,
  validateManifest,
} from "./manifest";
export { ConsoleProgressObserver, notifyObservers } from "./observers";
export { DEFAULT_CACHE_SIZE, defaultPathMatcher, PathMatcher } from "./path-matcher";
export {
  type ArchiveStrategy,
  DIRECTORY_MODE,
  exclusionArgs,
  INVALID_LIST_ENTRY_SIGNAL,
  NativeZipStrategy,
  runWithListFile,
  SevenZip7zStrategy,
  SevenZipZipStrategy,
} from "./strategies";
export { DEFAULT_PROGRESS_INTERVAL, TreeWalker } from "./tree-walker";
export { countZipEntries, verifyArchive } from "./verify";

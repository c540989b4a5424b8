/**
 * External compressor exports
 */

export { CHARSET_FLAGS, type ListFileEncoding, writeListFile } from "./list-file";
export {
  candidatePaths,
  type CompressorLocator,
  createCompressorLocator,
  EXECUTABLE_NAMES,
  isExecutableFile,
  type LocateOptions,
  locateCompressor,
  WINDOWS_INSTALL_PATHS,
} from "./locator";
export { type ProcessResult, type ProcessRunner, type RunProcessOptions, runProcess } from "./process";

/**
 * Archive pipeline errors
 */

import { formatBytes } from "../../utils/format";

export class ArchiveError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ArchiveError";
  }
}

export class EmptyInputError extends ArchiveError {
  constructor(message: string = "No files to back up; check the source paths") {
    super(message);
    this.name = "EmptyInputError";
  }
}

export class InsufficientSpaceError extends ArchiveError {
  constructor(
    readonly requiredBytes: number,
    readonly freeBytes: number,
    readonly directory: string,
  ) {
    super(
      `Insufficient space in ${directory}: need ${formatBytes(requiredBytes)}, ${formatBytes(freeBytes)} free`,
    );
    this.name = "InsufficientSpaceError";
  }
}

export class ToolNotFoundError extends ArchiveError {
  constructor(tool: string = "7-Zip") {
    super(`${tool} executable not found`);
    this.name = "ToolNotFoundError";
  }
}

export class ExternalProcessError extends ArchiveError {
  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly stdout: string,
    readonly stderr: string,
  ) {
    super(message);
    this.name = "ExternalProcessError";
  }
}

/**
 * Raised when the compressor rejects a list-file entry; the caller rewrites
 * the list in another encoding and tries once more.
 */
export class EncodingRetryableError extends ExternalProcessError {
  constructor(exitCode: number | null, stdout: string, stderr: string) {
    super("Compressor rejected an entry in the list file", exitCode, stdout, stderr);
    this.name = "EncodingRetryableError";
  }
}

/**
 * List files handed to the compressor with "@<path>"
 */

import * as fs from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { WalkEntry } from "../types";

export type ListFileEncoding = "utf8" | "utf16le";

/**
 * Charset switch telling 7-Zip how the list file is encoded
 */
export const CHARSET_FLAGS: Record<ListFileEncoding, string> = {
  utf8: "-scsUTF-8",
  utf16le: "-scsUTF-16LE",
};

async function* encodeLines(
  entries: AsyncIterable<WalkEntry>,
  encoding: ListFileEncoding,
): AsyncGenerator<Buffer> {
  for await (const entry of entries) {
    yield Buffer.from(`${entry.path}\n`, encoding);
  }
}

/**
 * Stream entry paths to disk, one per line, without a byte order mark.
 */
export async function writeListFile(
  listFilePath: string,
  entries: AsyncIterable<WalkEntry>,
  encoding: ListFileEncoding,
): Promise<void> {
  await pipeline(
    Readable.from(encodeLines(entries, encoding)),
    fs.createWriteStream(listFilePath),
  );
}

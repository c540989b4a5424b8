/**
 * Check a finished archive against its manifest
 */

import * as fs from "node:fs";
import * as yauzl from "yauzl-promise";
import type { ManifestRecord, VerifyResult } from "../../types";
import { logger } from "../../utils/logger";
import { manifestPathFor, readManifest } from "./manifest";

export async function countZipEntries(
  archivePath: string,
): Promise<{ files: number; directories: number }> {
  const zip = await yauzl.open(archivePath);
  let files = 0;
  let directories = 0;

  try {
    for await (const entry of zip) {
      if (entry.filename.endsWith("/")) {
        directories++;
      } else {
        files++;
      }
    }
  } finally {
    await zip.close();
  }

  return { files, directories };
}

export async function verifyArchive(archivePath: string): Promise<VerifyResult> {
  const manifestPath = manifestPathFor(archivePath);
  const problems: string[] = [];
  let sizeBytes = 0;
  let exists = false;
  let manifest: ManifestRecord | null = null;
  let entries: VerifyResult["entries"] = null;

  try {
    sizeBytes = (await fs.promises.stat(archivePath)).size;
    exists = true;
  } catch {
    problems.push(`Archive not found: ${archivePath}`);
  }

  try {
    manifest = await readManifest(manifestPath);
  } catch (error) {
    problems.push(`Manifest unreadable: ${(error as Error).message}`);
  }

  if (manifest) {
    if (manifest.status !== "ok") {
      problems.push(`Manifest status is "${manifest.status}"; the run did not complete`);
    } else if (exists && manifest.output_size_bytes !== sizeBytes) {
      problems.push(
        `Size mismatch: manifest records ${manifest.output_size_bytes ?? "no size"}, file has ${sizeBytes} bytes`,
      );
    }
  }

  if (exists && archivePath.toLowerCase().endsWith(".zip")) {
    try {
      entries = await countZipEntries(archivePath);
      logger.debug(`ZIP holds ${entries.files} files and ${entries.directories} directories`);
    } catch (error) {
      problems.push(`Cannot read ZIP: ${(error as Error).message}`);
    }
  }

  return {
    archivePath,
    manifestPath,
    ok: problems.length === 0,
    problems,
    sizeBytes,
    manifest,
    entries,
  };
}

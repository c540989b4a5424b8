/**
 * 7-Zip command-line strategies
 */

import type { BackupSettings } from "../../../types";
import { ExternalToolStrategy } from "./external-tool";

/**
 * ZIP with 7-Zip's multithreaded Deflate
 */
export class SevenZipZipStrategy extends ExternalToolStrategy {
  readonly name = "7z-zip" as const;
  readonly format = "zip" as const;
  protected readonly label = "[7z ZIP]";

  protected formatArgs(settings: BackupSettings): string[] {
    return ["-tzip", `-mx=${settings.zipLevel}`, "-mm=Deflate", "-mmt=on"];
  }
}

/**
 * 7z with LZMA2 in solid mode: better ratio, no random access
 */
export class SevenZip7zStrategy extends ExternalToolStrategy {
  readonly name = "7z-7z" as const;
  readonly format = "7z" as const;
  protected readonly label = "[7z 7z]";

  protected formatArgs(settings: BackupSettings): string[] {
    return ["-t7z", `-mx=${settings.sevenZipLevel}`, "-m0=LZMA2", "-mmt=on", "-ms=on"];
  }
}

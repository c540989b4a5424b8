import { parseArgs } from "node:util";
import {
  canRunWithoutConfigFile,
  createConfigFromInlineOptions,
  createSettings,
  extractInlineOptions,
  findAndLoadConfig,
  findConfigFile,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  mergeInlineConfig,
  resolvePathsFrom,
  validateConfig,
  validateInlineOptionsForConfigFreeMode,
} from "../../config";
import { BackupExecutor, ConsoleProgressObserver } from "../../core";
import type { BackupSettings, PackratConfig, ProgressObserver } from "../../types";
import { formatBytes, formatDuration, logger, setLogLevel } from "../../utils";
import { color, formatSummary, SpinnerProgressObserver, ui } from "../ui";

/** Exit code for a run that started and then failed */
export const BACKUP_FAILED_EXIT_CODE = 2;

/**
 * Load the config file (merged with inline overrides), or build one from
 * inline options alone. Returns null after reporting when neither works.
 */
export async function resolveCommandConfig(
  configPath: string | undefined,
  values: Record<string, unknown>,
): Promise<PackratConfig | null> {
  const inlineOptions = extractInlineOptions(values);
  let config: PackratConfig;

  if (configPath || findConfigFile()) {
    config = await findAndLoadConfig(configPath);
    if (hasInlineOptions(inlineOptions)) {
      config = mergeInlineConfig(config, inlineOptions);
    }
  } else {
    if (!canRunWithoutConfigFile(inlineOptions)) {
      const validation = validateInlineOptionsForConfigFreeMode(inlineOptions);
      ui.error("No config file found and inline options are insufficient:");
      for (const err of validation.errors) {
        ui.message(`  - ${err}`);
      }
      ui.info("\nEither create a config file or provide required inline options.");
      ui.info("Required: --source AND --output");
      return null;
    }
    config = createConfigFromInlineOptions(inlineOptions);
  }

  // Inline paths are relative to the working directory
  const resolved = resolvePathsFrom(config, process.cwd());
  validateConfig(resolved);
  return resolved;
}

export async function backupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      "dry-run": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
      // Inline config options
      ...INLINE_CONFIG_OPTIONS,
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  let settings: BackupSettings;
  try {
    const config = await resolveCommandConfig(values.config, values);
    if (!config) {
      return 1;
    }
    settings = await createSettings(config);
  } catch (error) {
    ui.error(`Invalid configuration: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }

  ui.intro("packrat backup");
  const s = ui.spinner();

  try {
    s.start(values["dry-run"] ? "Planning backup..." : "Creating archive...");

    const observers: ProgressObserver[] = [new SpinnerProgressObserver(s)];
    if (values.verbose) {
      observers.push(new ConsoleProgressObserver());
    }

    const executor = new BackupExecutor(settings, { observers });
    const result = await executor.execute({ dryRun: values["dry-run"] });

    s.stop(result.dryRun ? "Plan ready" : "Archive created");

    const summaryItems = [
      { label: "Archive", value: result.archivePath },
      { label: "Manifest", value: result.dryRun ? null : result.manifestPath },
      {
        label: "Format",
        value: `${result.format} (${result.strategy}, ${settings.preferredFormat} preferred)`,
      },
      { label: "Files", value: result.totals.fileCount.toString() },
      { label: "Source size", value: formatBytes(result.totals.byteCount) },
      { label: "Archive size", value: result.dryRun ? null : formatBytes(result.sizeBytes) },
      { label: "Duration", value: result.dryRun ? null : formatDuration(result.durationMs) },
      { label: "Excluded", value: settings.excluded.length > 0 ? settings.excluded.join(", ") : null },
    ];

    ui.note(formatSummary(summaryItems), "Backup Summary");

    if (result.dryRun) {
      ui.warn("[DRY RUN] No archive was written.");
    }

    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    s.stop("Backup failed");
    ui.error(`Backup failed: ${(error as Error).message}`);
    logger.error("Backup failed", error);
    return BACKUP_FAILED_EXIT_CODE;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("packrat backup")} - Create an archive of the configured sources

${color.dim("USAGE:")}
  packrat backup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./packrat.config.yaml)
      --dry-run           Scan and check space without writing an archive
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
      --source <path>          Directory to back up (can be repeated)
      --exclude <path>         Directory to leave out (can be repeated)
  -o, --output <path>          Output directory
      --prefix <str>           Archive filename prefix (default: backup)
  -f, --format <zip|7z>        Preferred format (default: zip)
      --zip-level <0-9>        Deflate level for ZIP (default: 6)
      --7z-level <0-9>         LZMA2 level for 7z (default: 7)
      --safety-factor <n>      Free-space multiplier (default: 1.05)
      --compressor <path>      7-Zip executable to use
      --no-compressor          Always use the built-in ZIP writer
      --timeout <seconds>      Stop 7-Zip after this many seconds

${color.dim("NOTES:")}
  7z archives need 7-Zip. Without it packrat writes a ZIP archive.

${color.dim("EXAMPLES:")}
  packrat backup                                   # Use ./packrat.config.yaml
  packrat backup --dry-run                         # Preview totals and strategy
  packrat backup --source ~/Documents --output /mnt/backups
  packrat backup --source ~/Pictures --exclude ~/Pictures/cache -f 7z -o /mnt/backups
`);
}

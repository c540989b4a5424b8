import { parseArgs } from "node:util";
import { verifyArchive } from "../../core";
import type { VerifyResult } from "../../types";
import { formatBytes, setLogLevel } from "../../utils";
import { color, formatSummary, ui } from "../ui";

export async function verifyCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  if (positionals.length === 0) {
    ui.error("Specify one or more archive paths to verify");
    return 1;
  }

  try {
    ui.intro("packrat verify");

    const s = ui.spinner();
    s.start(`Verifying ${positionals.length} archive(s)...`);

    const results: VerifyResult[] = [];
    for (const archivePath of positionals) {
      results.push(await verifyArchive(archivePath));
    }

    s.stop("Verification complete");

    let totalProblems = 0;
    for (const result of results) {
      if (result.ok) {
        const detail = result.entries
          ? ` ${color.dim(`(${result.entries.files} files, ${formatBytes(result.sizeBytes)})`)}`
          : ` ${color.dim(`(${formatBytes(result.sizeBytes)})`)}`;
        ui.success(`${result.archivePath}${detail}`);
      } else {
        totalProblems += result.problems.length;
        ui.error(result.archivePath);
        for (const problem of result.problems) {
          ui.message(`  ${color.dim("-")} ${problem}`);
        }
      }
    }

    const failed = results.filter((r) => !r.ok).length;
    ui.note(
      formatSummary([
        { label: "Verified", value: results.length.toString() },
        { label: "Healthy", value: (results.length - failed).toString() },
        { label: "With problems", value: failed.toString() },
        { label: "Total problems", value: totalProblems.toString() },
      ]),
      "Verification Summary",
    );

    if (failed > 0) {
      ui.outro("Verification found problems");
      return 1;
    }

    ui.outro("All archives verified!");
    return 0;
  } catch (error) {
    ui.error(`Verify failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("packrat verify")} - Check archives against their manifests

${color.dim("USAGE:")}
  packrat verify <archive> [<archive>...] [OPTIONS]

${color.dim("OPTIONS:")}
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("CHECKS:")}
  - The manifest beside the archive exists and reports status "ok"
  - The recorded size matches the archive on disk
  - ZIP archives open and their entries can be listed

${color.dim("EXAMPLES:")}
  packrat verify /mnt/backups/backup_2024-01-15T14-30-00.zip
  packrat verify /mnt/backups/*.7z
`);
}

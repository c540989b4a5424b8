#!/usr/bin/env node

import * as p from "@clack/prompts";
import { backupCommand } from "./cli/commands/backup";
import { verifyCommand } from "./cli/commands/verify";
import { banner, color, VERSION } from "./cli/ui";

const LOGO = String.raw`
                   _                _
 _ __   __ _  ___ | | __ _ __  __ _| |_
| '_ \ / _' |/ __|| |/ /| '__|/ _' | __|
| |_) | (_| | (__ |   < | |  | (_| | |_
| .__/ \__,_|\___||_|\_\|_|   \__,_|\__|
|_|
`;

function printHelp(): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.intro(`${color.cyan("packrat")} ${color.dim(`v${VERSION}`)} - Directory trees to one archive`);

  p.note(
    `${color.cyan("backup")}      Create an archive of the configured sources
${color.cyan("verify")}      Check archives against their manifests`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `packrat backup                          ${color.dim("# Use ./packrat.config.yaml")}
packrat backup --dry-run                ${color.dim("# Preview totals and strategy")}
packrat backup --source ./docs -o /mnt  ${color.dim("# Run without a config file")}
packrat verify backup_*.zip             ${color.dim("# Verify archives")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("packrat <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(color.bold(color.cyan(LOGO)));
  banner("version");
  p.outro(`Run ${color.cyan("packrat --help")} for usage`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "backup":
      return backupCommand(commandArgs);

    case "verify":
      return verifyCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("packrat --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });

/**
 * The marknote command tree. Built fresh per call so each parse starts from
 * clean option state.
 */

import { Command } from "commander";
import { ExitCodes } from "./lib/models.js";
import { initCommand } from "./commands/init.js";
import { createCommand, newCommand } from "./commands/create.js";
import { listCommand } from "./commands/list.js";
import { showCommand } from "./commands/show.js";
import { searchCommand } from "./commands/search.js";
import { linkCommand } from "./commands/link.js";
import { networkCommand } from "./commands/network.js";

export const VERSION = "0.1.0";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("marknote")
    .description("Markdown notes with links, backlinks and network analysis")
    .version(VERSION, "-V, --version", "output the version number")
    .option("--store <path>", "path to store directory")
    .option("--root <path>", "root directory for store discovery")
    .option("--json", "output in JSON format")
    .option("-q, --quiet", "suppress non-essential output")
    .option("-v, --verbose", "show detailed output");

  // Register commands
  program.addCommand(initCommand());
  program.addCommand(createCommand());
  program.addCommand(newCommand());
  program.addCommand(listCommand());
  program.addCommand(showCommand());
  program.addCommand(searchCommand());
  program.addCommand(linkCommand());
  program.addCommand(networkCommand());

  // Handle unknown commands
  program.on("command:*", () => {
    console.error(`Error: Unknown command '${program.args[0]}'`);
    console.error('Run "marknote --help" for available commands.');
    process.exit(ExitCodes.USAGE_ERROR);
  });

  return program;
}

/**
 * marknote init - Initialize a new store.
 */

import { Command } from "commander";
import * as path from "node:path";
import { initStore, resolveStore } from "../lib/storage.js";
import { createLogger } from "../lib/logger.js";
import { readGlobals, runAction } from "./shared.js";

export function initCommand(): Command {
  return new Command("init")
    .description("Create a new Marknote store")
    .option("--stealth", "add store to .gitignore (local-only mode)")
    .option(
      "--visible",
      "use marknote/ instead of .marknote/ (visible in file listings)",
    )
    .action((options: { stealth?: boolean; visible?: boolean }, command: Command) => {
      runAction(command, () => {
        const globals = readGlobals(command);
        const log = createLogger(globals);
        const rootPath = globals.root ? path.resolve(globals.root) : process.cwd();

        const existing = resolveStore({ root: rootPath });
        if (existing) {
          if (globals.json) {
            console.log(
              JSON.stringify({
                status: "exists",
                path: existing.storePath,
                root: existing.rootPath,
              }),
            );
          } else if (!globals.quiet) {
            console.log(`Store already exists at ${existing.storePath}`);
          }
          return;
        }

        const { storePath, rootPath: storeRoot } = initStore(rootPath, {
          stealth: options.stealth,
          visible: options.visible,
        });

        if (globals.json) {
          console.log(
            JSON.stringify({
              status: "created",
              path: storePath,
              root: storeRoot,
              stealth: options.stealth ?? false,
              visible: options.visible ?? false,
            }),
          );
        } else if (!globals.quiet) {
          console.log(`Initialized Marknote store at ${storePath}`);
        }
        if (options.stealth) {
          log.info("Store added to .gitignore (stealth mode)");
        }
      });
    });
}

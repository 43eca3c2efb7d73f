/**
 * marknote show - Display a note.
 */

import { Command } from "commander";
import * as path from "node:path";
import { identityFrom, openStore, runAction } from "./shared.js";

export function showCommand(): Command {
  return new Command("show")
    .description("Display a note")
    .argument("<title>", "note title")
    .option("-c, --category <name>", "category of the note")
    .action((title: string, options: { category?: string }, command: Command) => {
      runAction(command, () => {
        const { store, location, globals } = openStore(command);
        const note = store.load(identityFrom(title, options.category));
        const fm = note.frontmatter;

        if (globals.json) {
          console.log(
            JSON.stringify(
              {
                title: fm.title,
                category: note.identity.category ?? null,
                created: fm.created ?? null,
                updated: fm.updated ?? null,
                tags: fm.tags ?? [],
                linked_notes: fm.linked_notes ?? [],
                path: note.path ? path.relative(location.rootPath, note.path) : null,
                content: note.body,
              },
              null,
              2,
            ),
          );
          return;
        }

        console.log(`# ${fm.title}`);
        console.log();
        console.log(`Category: ${note.identity.category ?? "None"}`);
        if (fm.tags?.length) {
          console.log(`Tags: ${fm.tags.join(", ")}`);
        }
        if (fm.created) {
          console.log(`Created: ${fm.created}`);
        }
        if (fm.linked_notes?.length) {
          console.log(`Links: ${fm.linked_notes.join(", ")}`);
        }

        if (note.body) {
          console.log();
          console.log("---");
          console.log();
          console.log(note.body);
        }
      });
    });
}

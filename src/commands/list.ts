/**
 * marknote list - List notes in the store.
 */

import { Command } from "commander";
import * as path from "node:path";
import { formatIdentity } from "../lib/identity.js";
import { openStore, runAction } from "./shared.js";

export function listCommand(): Command {
  return new Command("list")
    .description("List notes")
    .option("-c, --category <name>", "only notes in this category")
    .option("--tag <tag>", "filter by tag")
    .option("--since <date>", "filter by creation date (ISO 8601)")
    .action(
      (
        options: { category?: string; tag?: string; since?: string },
        command: Command,
      ) => {
        runAction(command, () => {
          const { store, location, globals } = openStore(command);

          let notes = store.enumerate({ category: options.category });

          if (options.tag) {
            const tag = options.tag;
            notes = notes.filter((n) => n.frontmatter.tags?.includes(tag));
          }

          if (options.since) {
            const sinceDate = new Date(options.since);
            notes = notes.filter((n) => {
              const created = n.frontmatter.created;
              return created !== undefined && new Date(created) >= sinceDate;
            });
          }

          if (globals.json) {
            const output = notes.map((n) => ({
              title: n.frontmatter.title,
              category: n.identity.category ?? null,
              tags: n.frontmatter.tags ?? [],
              linked_notes: n.frontmatter.linked_notes ?? [],
              path: n.path ? path.relative(location.rootPath, n.path) : null,
              created: n.frontmatter.created ?? null,
              updated: n.frontmatter.updated ?? null,
            }));
            console.log(JSON.stringify(output, null, 2));
            return;
          }

          if (notes.length === 0) {
            if (!globals.quiet) {
              console.log("No notes found.");
            }
            return;
          }

          for (const note of notes) {
            const tags = note.frontmatter.tags?.length
              ? ` [${note.frontmatter.tags.join(", ")}]`
              : "";
            console.log(`${formatIdentity(note.identity)}${tags}`);
          }
        });
      },
    );
}

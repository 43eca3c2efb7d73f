/**
 * marknote search - Find notes by title, tag or body text.
 *
 * Matching is a case-insensitive substring test. Title matches rank above
 * tag matches, which rank above body-only matches.
 */

import { Command } from "commander";
import * as path from "node:path";
import { formatIdentity } from "../lib/identity.js";
import { searchNotes } from "../lib/search.js";
import type { SearchMatch } from "../lib/search.js";
import { openStore, parseCount, runAction } from "./shared.js";

/**
 * Format a search result for human-readable output.
 */
export function formatMatch(match: SearchMatch): string {
  const tags = match.note.frontmatter.tags ?? [];
  let line = `${formatIdentity(match.note.identity)} (${match.fields.join(", ")})`;
  if (tags.length > 0) {
    line += ` [${tags.join(", ")}]`;
  }
  return line;
}

export function formatSearchResults(query: string, matches: SearchMatch[]): string {
  if (matches.length === 0) {
    return `No notes found matching '${query}'`;
  }
  const noun = matches.length === 1 ? "note" : "notes";
  return [
    `Found ${matches.length} ${noun} matching '${query}':`,
    ...matches.map((m) => `  ${formatMatch(m)}`),
  ].join("\n");
}

export function searchCommand(): Command {
  return new Command("search")
    .description("Search note titles, tags and bodies")
    .argument("<query>", "search text (case-insensitive)")
    .option("-c, --category <name>", "only search notes in this category")
    .option("--tag <tag>", "only search notes with this tag")
    .option("-n, --limit <n>", "limit number of results (0 for all)", parseCount)
    .action(
      (
        query: string,
        options: { category?: string; tag?: string; limit?: number },
        command: Command,
      ) => {
        runAction(command, () => {
          const { store, location, globals } = openStore(command);
          const matches = searchNotes(store, query, {
            scope: { category: options.category },
            tag: options.tag,
            limit: options.limit,
          });

          if (globals.json) {
            console.log(
              JSON.stringify(
                matches.map(({ note, fields }) => ({
                  title: note.frontmatter.title,
                  category: note.identity.category ?? null,
                  tags: note.frontmatter.tags ?? [],
                  matched: fields,
                  path: note.path ? path.relative(location.rootPath, note.path) : null,
                })),
                null,
                2,
              ),
            );
            return;
          }

          console.log(formatSearchResults(query, matches));
        });
      },
    );
}

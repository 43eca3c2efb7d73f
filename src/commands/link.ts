/**
 * marknote link - Manage links between notes.
 *
 * Subcommands:
 * - add: Link one note to another (optionally both ways)
 * - remove: Remove a link (optionally both ways)
 * - list: List a note's links or backlinks
 * - orphaned: Find links pointing at notes that do not exist
 * - show: Display a note with its links and backlinks
 */

import { Command } from "commander";
import type { NoteIdentity } from "../lib/models.js";
import { formatIdentity } from "../lib/identity.js";
import type { OrphanedLink } from "../lib/graph.js";
import {
  addLink,
  findOrphanedLinks,
  listLinks,
  removeLink,
  showNote,
} from "../lib/links.js";
import type { AddLinkResult, RemoveLinkResult } from "../lib/links.js";
import { identityFrom, openStore, runAction } from "./shared.js";

interface PairOptions {
  category?: string;
  targetCategory?: string;
  bidirectional?: boolean;
  strict?: boolean;
}

export function formatAddResult(result: AddLinkResult): string {
  const from = formatIdentity(result.source);
  const to = formatIdentity(result.target);

  if (result.reverse === undefined) {
    return result.forward === "created"
      ? `Linked ${from} -> ${to}`
      : `Already linked: ${from} -> ${to}`;
  }

  if (result.forward === "exists" && result.reverse === "exists") {
    return `Already linked: ${from} <-> ${to}`;
  }
  const notes = [
    result.forward === "exists" ? `${from} -> ${to} already existed` : "",
    result.reverse === "exists" ? `${to} -> ${from} already existed` : "",
  ].filter(Boolean);
  const suffix = notes.length > 0 ? ` (${notes.join("; ")})` : "";
  return `Linked ${from} <-> ${to}${suffix}`;
}

export function formatRemoveResult(result: RemoveLinkResult): string {
  const from = formatIdentity(result.source);
  const to = formatIdentity(result.target);

  if (result.reverse === undefined) {
    return `Removed link ${from} -> ${to}`;
  }

  const absent = [
    result.forward === "absent" ? `${from} -> ${to}` : "",
    result.reverse === "absent" ? `${to} -> ${from}` : "",
  ].filter(Boolean);
  const suffix = absent.length > 0 ? ` (${absent.join("; ")} was not present)` : "";
  return `Removed link ${from} <-> ${to}${suffix}`;
}

/**
 * Group orphaned links by source note, one line per source.
 */
export function formatOrphans(orphans: OrphanedLink[]): string {
  if (orphans.length === 0) {
    return "No orphaned links found.";
  }

  const bySource = new Map<string, string[]>();
  for (const { source, target } of orphans) {
    const key = formatIdentity(source);
    const targets = bySource.get(key) ?? [];
    targets.push(formatIdentity(target));
    bySource.set(key, targets);
  }

  const lines = ["Orphaned links:"];
  for (const [source, targets] of bySource) {
    lines.push(`  ${source} -> ${targets.join(", ")}`);
  }
  return lines.join("\n");
}

const identityJson = (identity: NoteIdentity) => ({
  title: identity.title,
  category: identity.category ?? null,
});

// ============ Subcommands ============

function linkAddCommand(): Command {
  return new Command("add")
    .description("Add a link from SOURCE to TARGET")
    .argument("<source>", "source note title")
    .argument("<target>", "target note title")
    .option("-b, --bidirectional", "also link TARGET back to SOURCE")
    .option("-c, --category <name>", "category of the source note")
    .option("-t, --target-category <name>", "category of the target note")
    .option("--strict", "fail when the link already exists")
    .action(
      (source: string, target: string, options: PairOptions, command: Command) => {
        runAction(command, () => {
          const { store, globals } = openStore(command);

          const result = addLink(
            store,
            identityFrom(source, options.category),
            identityFrom(target, options.targetCategory),
            { bidirectional: options.bidirectional, strict: options.strict },
          );

          if (globals.json) {
            console.log(
              JSON.stringify({
                status: "linked",
                source: identityJson(result.source),
                target: identityJson(result.target),
                forward: result.forward,
                reverse: result.reverse ?? null,
              }),
            );
          } else {
            console.log(formatAddResult(result));
          }
        });
      },
    );
}

function linkRemoveCommand(): Command {
  return new Command("remove")
    .description("Remove the link from SOURCE to TARGET")
    .argument("<source>", "source note title")
    .argument("<target>", "target note title")
    .option("-b, --bidirectional", "remove links in both directions")
    .option("-c, --category <name>", "category of the source note")
    .option("-t, --target-category <name>", "category of the target note")
    .action(
      (source: string, target: string, options: PairOptions, command: Command) => {
        runAction(command, () => {
          const { store, globals } = openStore(command);

          const result = removeLink(
            store,
            identityFrom(source, options.category),
            identityFrom(target, options.targetCategory),
            { bidirectional: options.bidirectional },
          );

          if (globals.json) {
            console.log(
              JSON.stringify({
                status: "removed",
                source: identityJson(result.source),
                target: identityJson(result.target),
                forward: result.forward,
                reverse: result.reverse ?? null,
              }),
            );
          } else {
            console.log(formatRemoveResult(result));
          }
        });
      },
    );
}

function linkListCommand(): Command {
  return new Command("list")
    .description("List links from a note")
    .argument("<title>", "note title")
    .option("-c, --category <name>", "category of the note")
    .option("-b, --backlinks", "also list notes that link to this note")
    .action(
      (
        title: string,
        options: { category?: string; backlinks?: boolean },
        command: Command,
      ) => {
        runAction(command, () => {
          const { store, globals, log } = openStore(command);

          const listing = listLinks(store, identityFrom(title, options.category), {
            includeBacklinks: options.backlinks,
          });

          if (globals.json) {
            console.log(
              JSON.stringify({
                note: identityJson(listing.note),
                outgoing: listing.outgoing.map(identityJson),
                missing: listing.missing.map(identityJson),
                incoming: options.backlinks
                  ? listing.incoming.map(identityJson)
                  : null,
              }),
            );
            return;
          }

          const name = formatIdentity(listing.note);
          const missing = new Set(listing.missing.map(formatIdentity));

          if (listing.outgoing.length > 0) {
            console.log("Outgoing:");
            for (const target of listing.outgoing) {
              const key = formatIdentity(target);
              console.log(`  -> ${key}${missing.has(key) ? " (missing)" : ""}`);
            }
          } else {
            console.log(`No links from ${name}`);
          }

          if (options.backlinks) {
            if (listing.incoming.length > 0) {
              console.log("Incoming:");
              for (const from of listing.incoming) {
                console.log(`  <- ${formatIdentity(from)}`);
              }
            } else {
              console.log(`No notes link to ${name}`);
            }
          }

          if (listing.missing.length > 0) {
            log.warn(
              `Could not find linked notes: ${[...missing].join(", ")}`,
            );
          }
        });
      },
    );
}

function linkOrphanedCommand(): Command {
  return new Command("orphaned")
    .description("Find links that point to notes that do not exist")
    .option("-c, --category <name>", "only check notes in this category")
    .action((options: { category?: string }, command: Command) => {
      runAction(command, () => {
        const { store, globals } = openStore(command);
        const orphans = findOrphanedLinks(store, { category: options.category });

        if (globals.json) {
          console.log(
            JSON.stringify(
              orphans.map((o) => ({
                source: identityJson(o.source),
                target: identityJson(o.target),
              })),
            ),
          );
        } else {
          console.log(formatOrphans(orphans));
        }
      });
    });
}

function linkShowCommand(): Command {
  return new Command("show")
    .description("Display a note with its linked notes and backlinks")
    .argument("<title>", "note title")
    .option("-c, --category <name>", "category of the note")
    .action((title: string, options: { category?: string }, command: Command) => {
      runAction(command, () => {
        const { store, globals } = openStore(command);
        const { note, linked, missing, backlinks } = showNote(
          store,
          identityFrom(title, options.category),
        );

        if (globals.json) {
          console.log(
            JSON.stringify(
              {
                note: identityJson(note.identity),
                tags: note.frontmatter.tags ?? [],
                content: note.body,
                linked: linked.map((n) => identityJson(n.identity)),
                missing: missing.map(identityJson),
                backlinks: backlinks.map((n) => identityJson(n.identity)),
              },
              null,
              2,
            ),
          );
          return;
        }

        console.log(`# ${note.frontmatter.title}`);
        console.log(
          `Category: ${note.identity.category ?? "None"} | Tags: ${note.frontmatter.tags?.join(", ") || "None"}`,
        );
        if (note.body) {
          console.log();
          console.log(note.body);
        }

        console.log();
        if (linked.length > 0 || missing.length > 0) {
          console.log("Linked notes:");
          for (const n of linked) {
            console.log(`  -> ${formatIdentity(n.identity)}`);
          }
          for (const m of missing) {
            console.log(`  -> ${formatIdentity(m)} (missing)`);
          }
        } else {
          console.log("No linked notes.");
        }

        if (backlinks.length > 0) {
          console.log("Backlinks:");
          for (const n of backlinks) {
            console.log(`  <- ${formatIdentity(n.identity)}`);
          }
        } else {
          console.log("No backlinks.");
        }
      });
    });
}

// ============ Main link command ============

export function linkCommand(): Command {
  return new Command("link")
    .description("Manage links between notes")
    .addCommand(linkAddCommand())
    .addCommand(linkRemoveCommand())
    .addCommand(linkListCommand())
    .addCommand(linkOrphanedCommand())
    .addCommand(linkShowCommand());
}

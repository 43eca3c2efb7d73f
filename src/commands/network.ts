/**
 * marknote network - Analyze the note network.
 *
 * Subcommands:
 * - stats: Degree statistics and the most connected notes
 * - standalone: Notes with no links in either direction
 * - path: Shortest chain of links between two notes
 */

import { Command } from "commander";
import type { NoteIdentity } from "../lib/models.js";
import { formatIdentity } from "../lib/identity.js";
import { findStandalone, networkStats } from "../lib/network.js";
import type { NetworkStats } from "../lib/network.js";
import { shortestPath } from "../lib/paths.js";
import type { PathResult } from "../lib/paths.js";
import { identityFrom, openStore, parseCount, runAction } from "./shared.js";

function percent(part: number, whole: number): string {
  return whole > 0 ? `${((part / whole) * 100).toFixed(1)}%` : "0.0%";
}

export function formatStats(stats: NetworkStats): string {
  const lines = [
    `Total notes: ${stats.totalNotes}`,
    `Notes with links: ${stats.notesWithLinks} (${percent(stats.notesWithLinks, stats.totalNotes)})`,
    `Notes with outgoing links: ${stats.notesWithOutgoing}`,
    `Notes with incoming links: ${stats.notesWithIncoming}`,
    `Standalone notes: ${stats.standaloneNotes}`,
    `Total links: ${stats.totalLinks}`,
    `Average links per note: ${stats.averageDegree.toFixed(2)}`,
  ];

  if (stats.mostConnected.length > 0) {
    lines.push("", "Most connected:");
    for (const d of stats.mostConnected) {
      lines.push(
        `  ${formatIdentity(d.identity)}  out=${d.outDegree} in=${d.inDegree} total=${d.outDegree + d.inDegree}`,
      );
    }
  }

  if (stats.orphanedLinks > 0) {
    lines.push(
      "",
      `Warning: ${stats.notesWithOrphanedLinks} note(s) have orphaned links. Run "marknote link orphaned" for details.`,
    );
  }

  return lines.join("\n");
}

export function formatPath(result: PathResult): string {
  const from = formatIdentity(result.source);
  const to = formatIdentity(result.target);

  if (!result.found) {
    if (result.reason === "depth-exceeded") {
      return `No path found from ${from} to ${to} within ${result.maxDepth} link(s)`;
    }
    return `No path found from ${from} to ${to}`;
  }

  const hops = `${result.length} hop${result.length !== 1 ? "s" : ""}`;
  return `Path found (${hops}):\n${result.path.map(formatIdentity).join(" -> ")}`;
}

const identityJson = (identity: NoteIdentity) => ({
  title: identity.title,
  category: identity.category ?? null,
});

// ============ Subcommands ============

function networkStatsCommand(): Command {
  return new Command("stats")
    .description("Show statistics about the note network")
    .option("-c, --category <name>", "only analyze notes in this category")
    .option(
      "-l, --limit <n>",
      "number of most connected notes to show (0 for none)",
      parseCount,
    )
    .action(
      (options: { category?: string; limit?: number }, command: Command) => {
        runAction(command, () => {
          const { store, config, globals, log } = openStore(command);
          const stats = networkStats(
            store,
            { category: options.category },
            options.limit ?? config.stats_limit,
          );
          log.debug(
            `graph: ${stats.totalNotes} notes, ${stats.resolvedEdges} edges`,
          );

          if (globals.json) {
            console.log(
              JSON.stringify(
                {
                  ...stats,
                  scope: { category: stats.scope.category ?? null },
                  degrees: stats.degrees.map((d) => ({
                    ...identityJson(d.identity),
                    out: d.outDegree,
                    in: d.inDegree,
                  })),
                  mostConnected: stats.mostConnected.map((d) => ({
                    ...identityJson(d.identity),
                    out: d.outDegree,
                    in: d.inDegree,
                  })),
                },
                null,
                2,
              ),
            );
          } else if (stats.totalNotes === 0) {
            console.log("No notes found.");
          } else {
            console.log(formatStats(stats));
          }
        });
      },
    );
}

function networkStandaloneCommand(): Command {
  return new Command("standalone")
    .description("Find notes that are not connected to any other note")
    .option("-c, --category <name>", "only check notes in this category")
    .action((options: { category?: string }, command: Command) => {
      runAction(command, () => {
        const { store, globals } = openStore(command);
        const standalone = findStandalone(store, { category: options.category });

        if (globals.json) {
          console.log(JSON.stringify(standalone.map(identityJson)));
        } else if (standalone.length === 0) {
          console.log("All notes are connected to at least one other note.");
        } else {
          console.log(`Standalone notes (${standalone.length}):`);
          for (const identity of standalone) {
            console.log(`  ${formatIdentity(identity)}`);
          }
        }
      });
    });
}

function networkPathCommand(): Command {
  return new Command("path")
    .description("Find the shortest path from SOURCE to TARGET")
    .argument("<source>", "source note title")
    .argument("<target>", "target note title")
    .option("-c, --category <name>", "category of the source note")
    .option("-t, --target-category <name>", "category of the target note")
    .option("-s, --scope <category>", "only follow links within this category")
    .option(
      "-d, --max-depth <n>",
      "maximum number of links to follow (0 for unbounded)",
      parseCount,
    )
    .action(
      (
        source: string,
        target: string,
        options: {
          category?: string;
          targetCategory?: string;
          scope?: string;
          maxDepth?: number;
        },
        command: Command,
      ) => {
        runAction(command, () => {
          const { store, config, globals } = openStore(command);

          const result = shortestPath(
            store,
            identityFrom(source, options.category),
            identityFrom(target, options.targetCategory),
            {
              scope: { category: options.scope },
              maxDepth: options.maxDepth ?? config.path_max_depth,
            },
          );

          if (globals.json) {
            console.log(
              JSON.stringify({
                source: identityJson(result.source),
                target: identityJson(result.target),
                found: result.found,
                length: result.found ? result.length : null,
                path: result.found ? result.path.map(identityJson) : null,
                reason: result.found ? null : result.reason,
              }),
            );
          } else {
            console.log(formatPath(result));
          }
        });
      },
    );
}

// ============ Main network command ============

export function networkCommand(): Command {
  return new Command("network")
    .description("Analyze note networks and connections")
    .addCommand(networkStatsCommand())
    .addCommand(networkStandaloneCommand())
    .addCommand(networkPathCommand());
}

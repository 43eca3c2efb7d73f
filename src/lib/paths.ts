/**
 * Shortest paths through the directed link graph.
 *
 * Breadth-first search over outgoing links, one level at a time. Neighbours
 * are visited in identity order and the first parent to reach a note keeps
 * it, so the same notes always produce the same path.
 */

import type { NoteIdentity, Scope } from "./models.js";
import type { NoteStore } from "./storage.js";
import { loadGraph } from "./graph.js";
import type { LinkGraph } from "./graph.js";
import { formatIdentity, identitiesEqual } from "./identity.js";
import { NoteNotFoundError } from "./errors.js";

export interface PathFound {
  found: true;
  source: NoteIdentity;
  target: NoteIdentity;
  /** Source to target, both inclusive */
  path: NoteIdentity[];
  /** Number of links followed */
  length: number;
}

export interface PathNotFound {
  found: false;
  source: NoteIdentity;
  target: NoteIdentity;
  /** "depth-exceeded" when the bound stopped a search that could continue */
  reason: "unreachable" | "depth-exceeded";
  maxDepth: number;
}

export type PathResult = PathFound | PathNotFound;

export interface PathOptions {
  scope?: Scope;
  /** Maximum number of links in the path; 0 or unset means unbounded */
  maxDepth?: number;
}

function resolveInGraph(graph: LinkGraph, ref: NoteIdentity): NoteIdentity {
  // A bare title inside a category scope means the note in that category
  const scoped =
    ref.category === undefined && graph.scope.category !== undefined
      ? { title: ref.title, category: graph.scope.category }
      : ref;
  const note = graph.lookup.resolve(scoped);
  if (!note || !graph.inScope(note.identity)) {
    throw new NoteNotFoundError(ref);
  }
  return note.identity;
}

/**
 * Search an already built graph. Both endpoints must be notes in it.
 */
export function findPath(
  graph: LinkGraph,
  source: NoteIdentity,
  target: NoteIdentity,
  maxDepth = 0,
): PathResult {
  // Without a bound no simple path is longer than the note count
  const bound = maxDepth > 0 ? maxDepth : graph.notes.length;

  if (identitiesEqual(source, target)) {
    return { found: true, source, target, path: [source], length: 0 };
  }

  const targetKey = formatIdentity(target);
  const parents = new Map<string, NoteIdentity | null>();
  parents.set(formatIdentity(source), null);

  let frontier: NoteIdentity[] = [source];
  let depth = 0;

  while (frontier.length > 0) {
    if (depth >= bound) {
      // Only a frontier that could still grow was actually cut short
      const canContinue = frontier.some((current) =>
        graph
          .outgoing(current)
          .some((neighbour) => !parents.has(formatIdentity(neighbour))),
      );
      return {
        found: false,
        source,
        target,
        reason: canContinue ? "depth-exceeded" : "unreachable",
        maxDepth,
      };
    }

    const next: NoteIdentity[] = [];
    for (const current of frontier) {
      for (const neighbour of graph.outgoing(current)) {
        const key = formatIdentity(neighbour);
        if (parents.has(key)) continue;
        parents.set(key, current);

        if (key === targetKey) {
          const path = reconstruct(parents, neighbour);
          return { found: true, source, target, path, length: path.length - 1 };
        }
        next.push(neighbour);
      }
    }

    frontier = next;
    depth++;
  }

  return { found: false, source, target, reason: "unreachable", maxDepth };
}

function reconstruct(
  parents: Map<string, NoteIdentity | null>,
  end: NoteIdentity,
): NoteIdentity[] {
  const path: NoteIdentity[] = [];
  let current: NoteIdentity | null = end;

  while (current !== null) {
    path.unshift(current);
    current = parents.get(formatIdentity(current)) ?? null;
  }

  return path;
}

/**
 * Find the shortest path between two notes within a scope.
 *
 * Throws NoteNotFoundError when either note is missing from the scope. Not
 * finding a path is a normal result, not an error.
 */
export function shortestPath(
  store: NoteStore,
  source: NoteIdentity,
  target: NoteIdentity,
  options: PathOptions = {},
): PathResult {
  const graph = loadGraph(store, options.scope ?? {});
  const from = resolveInGraph(graph, source);
  const to = resolveInGraph(graph, target);

  return findPath(graph, from, to, options.maxDepth ?? 0);
}

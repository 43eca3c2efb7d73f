/**
 * Network analysis over the link graph: degree statistics, the most
 * connected notes, and standalone notes.
 */

import type { NoteIdentity, Scope } from "./models.js";
import type { NoteStore } from "./storage.js";
import { loadGraph } from "./graph.js";
import type { LinkGraph } from "./graph.js";
import { compareIdentities, formatIdentity } from "./identity.js";

/**
 * Degree counts for one note.
 */
export interface NoteDegree {
  identity: NoteIdentity;
  /** Distinct `linked_notes` entries, dangling ones included */
  outDegree: number;
  /** Notes in scope linking to this one */
  inDegree: number;
}

export interface NetworkStats {
  scope: Scope;
  totalNotes: number;
  /** Sum of out-degrees */
  totalLinks: number;
  /** Links that resolve to a note in scope */
  resolvedEdges: number;
  /** totalLinks / totalNotes, 0 for an empty scope */
  averageDegree: number;
  notesWithLinks: number;
  notesWithOutgoing: number;
  notesWithIncoming: number;
  standaloneNotes: number;
  orphanedLinks: number;
  notesWithOrphanedLinks: number;
  /** Every note in scope, in identity order */
  degrees: NoteDegree[];
  /** Most connected notes, best first; empty when limit <= 0 */
  mostConnected: NoteDegree[];
}

export function computeDegrees(graph: LinkGraph): NoteDegree[] {
  return graph.notes.map((note) => ({
    identity: note.identity,
    outDegree: graph.outDegree(note.identity),
    inDegree: graph.inDegree(note.identity),
  }));
}

/**
 * Rank notes by combined degree, highest first. Ties keep identity order.
 */
export function rankByDegree(degrees: NoteDegree[], limit: number): NoteDegree[] {
  if (limit <= 0) return [];

  return [...degrees]
    .sort((a, b) => {
      const diff = b.outDegree + b.inDegree - (a.outDegree + a.inDegree);
      if (diff !== 0) return diff;
      return compareIdentities(a.identity, b.identity);
    })
    .slice(0, limit);
}

/**
 * Compute aggregate statistics for the notes in scope.
 */
export function networkStats(
  store: NoteStore,
  scope: Scope = {},
  limit = 10,
): NetworkStats {
  const graph = loadGraph(store, scope);
  const degrees = computeDegrees(graph);

  const totalNotes = degrees.length;
  const totalLinks = degrees.reduce((sum, d) => sum + d.outDegree, 0);
  const notesWithOutgoing = degrees.filter((d) => d.outDegree > 0).length;
  const notesWithIncoming = degrees.filter((d) => d.inDegree > 0).length;
  const notesWithLinks = degrees.filter(
    (d) => d.outDegree > 0 || d.inDegree > 0,
  ).length;
  const sourcesWithOrphans = new Set(
    graph.orphaned.map((o) => formatIdentity(o.source)),
  );

  return {
    scope,
    totalNotes,
    totalLinks,
    resolvedEdges: graph.edgeCount(),
    averageDegree: totalNotes > 0 ? totalLinks / totalNotes : 0,
    notesWithLinks,
    notesWithOutgoing,
    notesWithIncoming,
    standaloneNotes: totalNotes - notesWithLinks,
    orphanedLinks: graph.orphaned.length,
    notesWithOrphanedLinks: sourcesWithOrphans.size,
    degrees,
    mostConnected: rankByDegree(degrees, limit),
  };
}

/**
 * Notes with neither outgoing nor incoming links.
 */
export function findStandalone(
  store: NoteStore,
  scope: Scope = {},
): NoteIdentity[] {
  const graph = loadGraph(store, scope);
  return computeDegrees(graph)
    .filter((d) => d.outDegree === 0 && d.inDegree === 0)
    .map((d) => d.identity);
}

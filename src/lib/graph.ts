/**
 * Link graph construction.
 *
 * The graph is rebuilt from the notes' `linked_notes` lists every time a query
 * needs it and is never written back to disk:
 * - nodes: every note in scope, sorted by identity key
 * - edges: entries that resolve to another note in scope
 * - orphaned links: entries that resolve to no note at all
 *
 * Entries that point at an existing note outside the scope count towards the
 * source's out-degree but are neither edges nor orphans.
 */

import type { Note, NoteIdentity, Scope } from "./models.js";
import type { NoteStore } from "./storage.js";
import { SelfLinkError } from "./errors.js";
import {
  compareKeys,
  formatIdentity,
  identitiesEqual,
  parseIdentity,
} from "./identity.js";

/**
 * An outgoing link whose target does not exist.
 */
export interface OrphanedLink {
  source: NoteIdentity;
  target: NoteIdentity;
}

/**
 * Resolves link references against an enumerated note collection, using the
 * same precedence as the store: an exact (title, category) match when a
 * category is given, otherwise the uncategorized note first and then
 * categories in order.
 */
export class NoteLookup {
  private readonly byKey = new Map<string, Note>();
  private readonly byTitle = new Map<string, Note[]>();

  constructor(notes: Note[]) {
    for (const note of notes) {
      this.byKey.set(formatIdentity(note.identity), note);
      const sameTitle = this.byTitle.get(note.identity.title) ?? [];
      sameTitle.push(note);
      this.byTitle.set(note.identity.title, sameTitle);
    }

    for (const candidates of this.byTitle.values()) {
      candidates.sort((a, b) =>
        compareKeys(a.identity.category ?? "", b.identity.category ?? ""),
      );
    }
  }

  resolve(ref: NoteIdentity): Note | undefined {
    if (ref.category !== undefined) {
      return this.byKey.get(formatIdentity(ref));
    }
    return this.byTitle.get(ref.title)?.[0];
  }

  has(identity: NoteIdentity): boolean {
    return this.byKey.has(formatIdentity(identity));
  }
}

/**
 * Rewrite `linked_notes` entries for a note as identity keys: entries that
 * resolve become the key of the note they resolve to, the rest are kept as
 * dangling references. Later entries naming an already listed note are
 * dropped. A reference to the note itself throws SelfLinkError.
 *
 * `lookup` must include the note itself so bare self-references are caught.
 */
export function canonicalLinks(
  lookup: NoteLookup,
  source: NoteIdentity,
  entries: string[],
): string[] {
  const keys: string[] = [];

  for (const entry of entries) {
    const ref = parseIdentity(entry);
    if (!ref.title) continue;

    const target = lookup.resolve(ref);
    const identity = target ? target.identity : ref;
    if (identitiesEqual(identity, source)) {
      throw new SelfLinkError(source);
    }

    const key = formatIdentity(identity);
    if (!keys.includes(key)) keys.push(key);
  }

  return keys;
}

/**
 * Ephemeral adjacency structure for one query or mutation.
 */
export class LinkGraph {
  readonly scope: Scope;
  /** Notes in scope, sorted by identity key */
  readonly notes: Note[];
  /** Resolver over the whole collection, not just the scope */
  readonly lookup: NoteLookup;
  /** Outgoing links whose target does not exist, in source order */
  readonly orphaned: OrphanedLink[];

  private readonly outgoingByKey = new Map<string, NoteIdentity[]>();
  private readonly outDegreeByKey = new Map<string, number>();
  private incomingByKey: Map<string, NoteIdentity[]> | null = null;

  constructor(collection: Note[], scope: Scope = {}) {
    this.scope = scope;
    this.lookup = new NoteLookup(collection);
    this.notes = collection.filter((n) => this.inScope(n.identity));
    this.orphaned = [];

    for (const note of this.notes) {
      this.addNote(note);
    }
  }

  /**
   * Whether an identity belongs to this graph's scope.
   */
  inScope(identity: NoteIdentity): boolean {
    return (
      this.scope.category === undefined ||
      identity.category === this.scope.category
    );
  }

  /**
   * Outgoing in-scope neighbours, sorted by identity key.
   */
  outgoing(identity: NoteIdentity): NoteIdentity[] {
    return this.outgoingByKey.get(formatIdentity(identity)) ?? [];
  }

  /**
   * Notes in scope that link to this one, sorted by identity key. The reverse
   * index is built on first use.
   */
  incoming(identity: NoteIdentity): NoteIdentity[] {
    if (!this.incomingByKey) {
      this.incomingByKey = new Map();
      for (const note of this.notes) {
        for (const target of this.outgoing(note.identity)) {
          const key = formatIdentity(target);
          const sources = this.incomingByKey.get(key) ?? [];
          sources.push(note.identity);
          this.incomingByKey.set(key, sources);
        }
      }
    }
    return this.incomingByKey.get(formatIdentity(identity)) ?? [];
  }

  /**
   * Distinct `linked_notes` entries of a note, dangling ones included.
   */
  outDegree(identity: NoteIdentity): number {
    return this.outDegreeByKey.get(formatIdentity(identity)) ?? 0;
  }

  inDegree(identity: NoteIdentity): number {
    return this.incoming(identity).length;
  }

  /**
   * Number of resolved edges between notes in scope.
   */
  edgeCount(): number {
    let count = 0;
    for (const targets of this.outgoingByKey.values()) {
      count += targets.length;
    }
    return count;
  }

  has(identity: NoteIdentity): boolean {
    return this.outgoingByKey.has(formatIdentity(identity));
  }

  private addNote(note: Note): void {
    const sourceKey = formatIdentity(note.identity);
    const seen = new Set<string>();
    const targets: NoteIdentity[] = [];

    for (const entry of note.frontmatter.linked_notes ?? []) {
      const ref = parseIdentity(entry);
      if (!ref.title) continue;

      const target = this.lookup.resolve(ref);
      const targetIdentity = target ? target.identity : ref;
      const targetKey = formatIdentity(targetIdentity);

      if (identitiesEqual(targetIdentity, note.identity)) continue;
      if (seen.has(targetKey)) continue;
      seen.add(targetKey);

      if (!target) {
        this.orphaned.push({ source: note.identity, target: ref });
      } else if (this.inScope(target.identity)) {
        targets.push(target.identity);
      }
    }

    targets.sort((a, b) => compareKeys(formatIdentity(a), formatIdentity(b)));
    this.outgoingByKey.set(sourceKey, targets);
    this.outDegreeByKey.set(sourceKey, seen.size);
  }
}

/**
 * Build the link graph for a scope from the current note files.
 */
export function loadGraph(store: NoteStore, scope: Scope = {}): LinkGraph {
  return new LinkGraph(store.enumerate(), scope);
}

/**
 * Link index: adds, removes and lists links between notes.
 *
 * A link A -> B exists exactly when A's `linked_notes` holds an entry that
 * resolves to B. A bidirectional link is the pair A -> B and B -> A, mutated
 * together; every change is persisted through the note store one note at a
 * time, forward direction first.
 */

import type { Note, NoteIdentity, Scope } from "./models.js";
import type { NoteStore } from "./storage.js";
import { loadGraph } from "./graph.js";
import type { LinkGraph, OrphanedLink } from "./graph.js";
import {
  formatIdentity,
  identitiesEqual,
  parseIdentity,
} from "./identity.js";
import {
  AlreadyLinkedError,
  LinkNotFoundError,
  PartialLinkError,
  SelfLinkError,
} from "./errors.js";
import type { LinkDirection } from "./errors.js";

export type AddOutcome = "created" | "exists";
export type RemoveOutcome = "removed" | "absent";

export interface AddLinkResult {
  source: NoteIdentity;
  target: NoteIdentity;
  forward: AddOutcome;
  /** Present only for bidirectional calls */
  reverse?: AddOutcome;
}

export interface RemoveLinkResult {
  source: NoteIdentity;
  target: NoteIdentity;
  forward: RemoveOutcome;
  /** Present only for bidirectional calls */
  reverse?: RemoveOutcome;
}

export interface LinkOptions {
  /** Also mutate the target -> source direction */
  bidirectional?: boolean;
}

/**
 * Does a `linked_notes` entry point at the given note? Bare titles are
 * resolved through the store, so "Ideas" matches "inbox/Ideas" when that is
 * the note the title resolves to.
 */
export function refersTo(
  store: NoteStore,
  entry: string,
  target: NoteIdentity,
): boolean {
  const ref = parseIdentity(entry);
  if (ref.category !== undefined) {
    return identitiesEqual(ref, target);
  }
  if (ref.title !== target.title) return false;

  const resolved = store.resolve(ref);
  return resolved !== null && identitiesEqual(resolved.identity, target);
}

function touch(note: Note): void {
  note.frontmatter.updated = new Date().toISOString();
}

/**
 * Persist a sequence of writes, turning a failure after an earlier success
 * into a PartialLinkError.
 */
function persistAll(
  store: NoteStore,
  operation: "add" | "remove",
  writes: Array<{ direction: LinkDirection; note: Note }>,
): void {
  const persisted: LinkDirection[] = [];
  for (const { direction, note } of writes) {
    try {
      store.save(note);
    } catch (err) {
      if (persisted.length === 0) throw err;
      throw new PartialLinkError(operation, persisted, direction, err);
    }
    persisted.push(direction);
  }
}

/**
 * Add a link from source to target (and back, when bidirectional).
 *
 * Directions that already exist are reported as "exists" and left
 * untouched. With `strict`, a call that creates nothing throws
 * AlreadyLinkedError instead.
 */
export function addLink(
  store: NoteStore,
  source: NoteIdentity,
  target: NoteIdentity,
  options: LinkOptions & { strict?: boolean } = {},
): AddLinkResult {
  if (identitiesEqual(source, target)) {
    throw new SelfLinkError(source);
  }

  const sourceNote = store.load(source);
  const targetNote = store.load(target);

  if (identitiesEqual(sourceNote.identity, targetNote.identity)) {
    throw new SelfLinkError(sourceNote.identity);
  }

  const sourceLinks = sourceNote.frontmatter.linked_notes ?? [];
  const targetLinks = targetNote.frontmatter.linked_notes ?? [];

  const forwardExists = sourceLinks.some((e) =>
    refersTo(store, e, targetNote.identity),
  );
  const reverseExists = options.bidirectional
    ? targetLinks.some((e) => refersTo(store, e, sourceNote.identity))
    : true;

  if (forwardExists && reverseExists && options.strict) {
    throw new AlreadyLinkedError(sourceNote.identity, targetNote.identity);
  }

  const writes: Array<{ direction: LinkDirection; note: Note }> = [];

  if (!forwardExists) {
    sourceNote.frontmatter.linked_notes = [
      ...sourceLinks,
      formatIdentity(targetNote.identity),
    ];
    touch(sourceNote);
    writes.push({ direction: "forward", note: sourceNote });
  }

  if (!reverseExists) {
    targetNote.frontmatter.linked_notes = [
      ...targetLinks,
      formatIdentity(sourceNote.identity),
    ];
    touch(targetNote);
    writes.push({ direction: "reverse", note: targetNote });
  }

  persistAll(store, "add", writes);

  const result: AddLinkResult = {
    source: sourceNote.identity,
    target: targetNote.identity,
    forward: forwardExists ? "exists" : "created",
  };
  if (options.bidirectional) {
    result.reverse = reverseExists ? "exists" : "created";
  }
  return result;
}

/**
 * Remove the link from source to target (and back, when bidirectional).
 *
 * A missing direction is a no-op; LinkNotFoundError is thrown only when no
 * requested direction existed. A one-way removal accepts a target that no
 * longer exists, so dangling entries can be cleaned up.
 */
export function removeLink(
  store: NoteStore,
  source: NoteIdentity,
  target: NoteIdentity,
  options: LinkOptions = {},
): RemoveLinkResult {
  const sourceNote = store.load(source);
  const targetNote = options.bidirectional
    ? store.load(target)
    : store.resolve(target);
  const targetIdentity = targetNote ? targetNote.identity : target;

  const matchesTarget = (entry: string): boolean =>
    targetNote
      ? refersTo(store, entry, targetNote.identity)
      : identitiesEqual(parseIdentity(entry), target);

  const sourceLinks = sourceNote.frontmatter.linked_notes ?? [];
  const forwardKept = sourceLinks.filter((e) => !matchesTarget(e));
  const forwardRemoved = forwardKept.length < sourceLinks.length;

  let reverseRemoved = false;
  let reverseKept: string[] = [];
  if (options.bidirectional && targetNote) {
    const targetLinks = targetNote.frontmatter.linked_notes ?? [];
    reverseKept = targetLinks.filter(
      (e) => !refersTo(store, e, sourceNote.identity),
    );
    reverseRemoved = reverseKept.length < targetLinks.length;
  }

  if (!forwardRemoved && !reverseRemoved) {
    throw new LinkNotFoundError(sourceNote.identity, targetIdentity);
  }

  const writes: Array<{ direction: LinkDirection; note: Note }> = [];

  if (forwardRemoved) {
    sourceNote.frontmatter.linked_notes = forwardKept;
    touch(sourceNote);
    writes.push({ direction: "forward", note: sourceNote });
  }

  if (reverseRemoved && targetNote) {
    targetNote.frontmatter.linked_notes = reverseKept;
    touch(targetNote);
    writes.push({ direction: "reverse", note: targetNote });
  }

  persistAll(store, "remove", writes);

  const result: RemoveLinkResult = {
    source: sourceNote.identity,
    target: targetIdentity,
    forward: forwardRemoved ? "removed" : "absent",
  };
  if (options.bidirectional) {
    result.reverse = reverseRemoved ? "removed" : "absent";
  }
  return result;
}

export interface LinkListing {
  note: NoteIdentity;
  /** Outgoing links in `linked_notes` order, resolved where possible */
  outgoing: NoteIdentity[];
  /** Outgoing entries that resolve to no note */
  missing: NoteIdentity[];
  /** Notes linking here, sorted; empty unless backlinks were requested */
  incoming: NoteIdentity[];
}

function collectOutgoing(
  graph: LinkGraph,
  note: Note,
): { outgoing: NoteIdentity[]; missing: NoteIdentity[] } {
  const outgoing: NoteIdentity[] = [];
  const missing: NoteIdentity[] = [];
  const seen = new Set<string>();

  for (const entry of note.frontmatter.linked_notes ?? []) {
    const ref = parseIdentity(entry);
    if (!ref.title) continue;

    const resolved = graph.lookup.resolve(ref);
    const identity = resolved ? resolved.identity : ref;
    const key = formatIdentity(identity);
    if (seen.has(key) || identitiesEqual(identity, note.identity)) continue;
    seen.add(key);

    outgoing.push(identity);
    if (!resolved) missing.push(ref);
  }

  return { outgoing, missing };
}

/**
 * List a note's outgoing links and, optionally, its backlinks. Backlinks
 * come from a scan of every note in the collection.
 */
export function listLinks(
  store: NoteStore,
  identity: NoteIdentity,
  options: { includeBacklinks?: boolean } = {},
): LinkListing {
  const note = store.load(identity);
  const graph = loadGraph(store);
  const { outgoing, missing } = collectOutgoing(graph, note);

  return {
    note: note.identity,
    outgoing,
    missing,
    incoming: options.includeBacklinks ? graph.incoming(note.identity) : [],
  };
}

export interface NoteWithLinks {
  note: Note;
  linked: Note[];
  missing: NoteIdentity[];
  backlinks: Note[];
}

/**
 * A note together with the notes it links to and the notes linking to it.
 */
export function showNote(
  store: NoteStore,
  identity: NoteIdentity,
): NoteWithLinks {
  const note = store.load(identity);
  const graph = loadGraph(store);
  const { outgoing, missing } = collectOutgoing(graph, note);

  const toNotes = (ids: NoteIdentity[]): Note[] =>
    ids.flatMap((id) => {
      const found = graph.lookup.resolve(id);
      return found ? [found] : [];
    });

  return {
    note,
    linked: toNotes(outgoing),
    missing,
    backlinks: toNotes(graph.incoming(note.identity)),
  };
}

/**
 * Every (source, target) pair in scope whose target does not exist.
 */
export function findOrphanedLinks(
  store: NoteStore,
  scope: Scope = {},
): OrphanedLink[] {
  return loadGraph(store, scope).orphaned;
}

/**
 * Case-insensitive substring search over note titles, tags and bodies.
 *
 * Results are ordered by where the query matched: title matches first, then
 * tag matches, then body-only matches. Within a group notes keep identity
 * order.
 */

import { ExitCodes } from "./models.js";
import type { Note, Scope } from "./models.js";
import type { NoteStore } from "./storage.js";
import { MarknoteError } from "./errors.js";

export type MatchField = "title" | "tag" | "body";

export interface SearchMatch {
  note: Note;
  /** Fields the query was found in, in title/tag/body order */
  fields: MatchField[];
}

export interface SearchOptions {
  scope?: Scope;
  /** Only notes carrying this exact tag */
  tag?: string;
  /** Maximum number of results; 0 or unset means all */
  limit?: number;
}

/**
 * Fields of a note containing the query, ignoring case. Empty when the note
 * does not match.
 */
export function matchNote(note: Note, query: string): MatchField[] {
  const needle = query.toLowerCase();
  const fields: MatchField[] = [];

  if (note.frontmatter.title.toLowerCase().includes(needle)) {
    fields.push("title");
  }
  if ((note.frontmatter.tags ?? []).some((t) => t.toLowerCase().includes(needle))) {
    fields.push("tag");
  }
  if (note.body.toLowerCase().includes(needle)) {
    fields.push("body");
  }

  return fields;
}

const FIELD_RANK: Record<MatchField, number> = { title: 0, tag: 1, body: 2 };

export function searchNotes(
  store: NoteStore,
  query: string,
  options: SearchOptions = {},
): SearchMatch[] {
  const trimmed = query.trim();
  if (!trimmed) {
    throw new MarknoteError("Search query cannot be empty", ExitCodes.USAGE_ERROR);
  }

  let notes = store.enumerate(options.scope ?? {});
  const tag = options.tag;
  if (tag !== undefined) {
    notes = notes.filter((n) => n.frontmatter.tags?.includes(tag));
  }

  const matches: SearchMatch[] = [];
  for (const note of notes) {
    const fields = matchNote(note, trimmed);
    if (fields.length > 0) matches.push({ note, fields });
  }

  // Stable sort: identity order holds within a rank
  matches.sort((a, b) => FIELD_RANK[a.fields[0]] - FIELD_RANK[b.fields[0]]);

  const limit = options.limit ?? 0;
  return limit > 0 ? matches.slice(0, limit) : matches;
}

/**
 * Note identity helpers.
 *
 * Identity keys are the string form stored in `linked_notes`:
 * - "Title" for an uncategorized note
 * - "category/Title" for a categorized note
 * - "/A/B testing" for an uncategorized note whose title contains "/"
 *
 * Matching is exact and case-sensitive on both parts.
 */

import type { NoteIdentity } from "./models.js";

/**
 * Build an identity, treating an empty category as uncategorized.
 */
export function makeIdentity(title: string, category?: string): NoteIdentity {
  return category ? { title, category } : { title };
}

/**
 * Format an identity as its canonical key.
 */
export function formatIdentity(identity: NoteIdentity): string {
  if (identity.category) {
    return `${identity.category}/${identity.title}`;
  }
  return identity.title.includes("/") ? `/${identity.title}` : identity.title;
}

/**
 * Parse a key written by formatIdentity (or typed by hand) back into an
 * identity. The first "/" separates category from title.
 */
export function parseIdentity(key: string): NoteIdentity {
  const trimmed = key.trim();
  if (trimmed.startsWith("/")) {
    return { title: trimmed.slice(1) };
  }

  const slash = trimmed.indexOf("/");
  if (slash === -1) {
    return { title: trimmed };
  }

  return makeIdentity(trimmed.slice(slash + 1), trimmed.slice(0, slash));
}

export function identitiesEqual(a: NoteIdentity, b: NoteIdentity): boolean {
  return a.title === b.title && (a.category ?? "") === (b.category ?? "");
}

/**
 * Plain code-unit comparison, so ordering does not depend on locale.
 */
export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order identities by their canonical key.
 */
export function compareIdentities(a: NoteIdentity, b: NoteIdentity): number {
  return compareKeys(formatIdentity(a), formatIdentity(b));
}

/**
 * Marknote - Markdown notes with a frontmatter link graph.
 *
 * This is the library entry point for programmatic usage.
 * For CLI usage, see cli.ts.
 */

// Re-export models
export * from "./lib/models.js";

// Re-export errors
export * from "./lib/errors.js";

// Re-export identity helpers
export {
  makeIdentity,
  formatIdentity,
  parseIdentity,
  identitiesEqual,
  compareIdentities,
} from "./lib/identity.js";

// Re-export storage
export {
  FileNoteStore,
  discoverStore,
  resolveStore,
  initStore,
  loadConfig,
  slugify,
  noteFilename,
  parseNote,
  serializeNote,
  readNote,
  writeNote,
  STORE_DIR,
  VISIBLE_STORE_DIR,
  NOTES_DIR,
  CONFIG_FILE,
} from "./lib/storage.js";
export type {
  NoteStore,
  FileNoteStoreOptions,
  StoreLocation,
} from "./lib/storage.js";

// Re-export the link graph
export { LinkGraph, NoteLookup, loadGraph, canonicalLinks } from "./lib/graph.js";
export type { OrphanedLink } from "./lib/graph.js";

export {
  addLink,
  removeLink,
  listLinks,
  showNote,
  findOrphanedLinks,
  refersTo,
} from "./lib/links.js";
export type {
  AddLinkResult,
  RemoveLinkResult,
  AddOutcome,
  RemoveOutcome,
  LinkListing,
  LinkOptions,
  NoteWithLinks,
} from "./lib/links.js";

export {
  networkStats,
  findStandalone,
  computeDegrees,
  rankByDegree,
} from "./lib/network.js";
export type { NetworkStats, NoteDegree } from "./lib/network.js";

export { shortestPath, findPath } from "./lib/paths.js";
export type {
  PathResult,
  PathFound,
  PathNotFound,
  PathOptions,
} from "./lib/paths.js";

export { searchNotes, matchNote } from "./lib/search.js";
export type { SearchMatch, SearchOptions, MatchField } from "./lib/search.js";

export { createLogger } from "./lib/logger.js";
export type { Logger, LoggerOptions } from "./lib/logger.js";

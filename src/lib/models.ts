/**
 * Core data models for Marknote.
 *
 * A note is a Markdown file with YAML frontmatter. The only persisted form of
 * the link graph is each note's `linked_notes` list, so everything here is
 * either a note record, an identity naming one, or a result computed from
 * those lists.
 */

/**
 * Names a note within the collection. An absent category means the note is
 * uncategorized (or, when resolving user input, "look in every category").
 */
export interface NoteIdentity {
  title: string;
  category?: string;
}

/**
 * YAML frontmatter structure for a note file.
 */
export interface NoteFrontmatter {
  /** Note title, unique within its category */
  title: string;
  /** Category (mirrors the directory the note lives in) */
  category?: string;
  /** ISO 8601 creation timestamp */
  created?: string;
  /** ISO 8601 last updated timestamp */
  updated?: string;
  /** List of tags */
  tags?: string[];
  /** Outgoing links as identity keys ("title" or "category/title") */
  linked_notes?: string[];
}

/**
 * A complete note with frontmatter and body content.
 */
export interface Note {
  /** Identity the store resolved this note under */
  identity: NoteIdentity;
  /** YAML frontmatter data */
  frontmatter: NoteFrontmatter;
  /** Markdown body content */
  body: string;
  /** Absolute file path */
  path?: string;
}

/**
 * Subset of notes a query considers: every category, or just one.
 */
export interface Scope {
  category?: string;
}

/**
 * Store configuration from config.toml.
 */
export interface StoreConfig {
  /** Format version for forward compatibility */
  format_version?: number;
  /** Default size of the `network stats` ranking */
  stats_limit?: number;
  /** Default depth bound for `network path` (0 = unbounded) */
  path_max_depth?: number;
}

/**
 * Default store configuration values.
 */
export const DEFAULT_CONFIG: Required<StoreConfig> = {
  format_version: 1,
  stats_limit: 10,
  path_max_depth: 5,
};

/**
 * Process exit codes.
 */
export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE_ERROR: 2,
  DATA_ERROR: 3,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

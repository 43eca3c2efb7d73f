/**
 * Storage layer for Marknote stores.
 *
 * Handles store discovery, initialization, configuration, and note file
 * operations. Notes live under `<store>/notes/`, one directory level per
 * category:
 *
 *   .marknote/
 *     config.toml
 *     notes/
 *       inbox-zero.md            (uncategorized)
 *       work/
 *         quarterly-plan.md      (category "work")
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as crypto from "node:crypto";
import matter from "gray-matter";
import toml from "toml";
import { DEFAULT_CONFIG, ExitCodes } from "./models.js";
import type {
  Note,
  NoteFrontmatter,
  NoteIdentity,
  Scope,
  StoreConfig,
} from "./models.js";
import { compareIdentities, formatIdentity, makeIdentity } from "./identity.js";
import { NoteLookup, canonicalLinks } from "./graph.js";
import {
  ConfigError,
  MarknoteError,
  NoteNotFoundError,
  StoreIOError,
} from "./errors.js";

/** Store directory name (hidden by default) */
export const STORE_DIR = ".marknote";

/** Store directory name when initialised with --visible */
export const VISIBLE_STORE_DIR = "marknote";

/** Directory holding note files, relative to the store */
export const NOTES_DIR = "notes";

/** Config file name */
export const CONFIG_FILE = "config.toml";

/**
 * Result of store discovery.
 */
export interface StoreLocation {
  /** Absolute path to the store directory (.marknote/) */
  storePath: string;
  /** Absolute path to the store root (parent of .marknote/) */
  rootPath: string;
}

function isDirectory(candidate: string): boolean {
  return fs.existsSync(candidate) && fs.statSync(candidate).isDirectory();
}

/**
 * Walk up from the given directory looking for a .marknote/ directory.
 * Returns null if not found.
 */
export function discoverStore(startDir: string): StoreLocation | null {
  let current = path.resolve(startDir);

  for (;;) {
    for (const name of [STORE_DIR, VISIBLE_STORE_DIR]) {
      const candidate = path.join(current, name);
      if (
        isDirectory(candidate) &&
        fs.existsSync(path.join(candidate, CONFIG_FILE))
      ) {
        return { storePath: candidate, rootPath: current };
      }
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

/**
 * Resolve store location from command options.
 *
 * 1. If --store provided, resolve relative to --root (or cwd)
 * 2. Otherwise, walk up from --root/cwd looking for .marknote/
 */
export function resolveStore(options: {
  store?: string;
  root?: string;
}): StoreLocation | null {
  const rootDir = options.root ? path.resolve(options.root) : process.cwd();

  if (options.store) {
    const storePath = path.resolve(rootDir, options.store);
    if (isDirectory(storePath)) {
      return {
        storePath,
        rootPath: path.dirname(storePath),
      };
    }
    return null;
  }

  return discoverStore(rootDir);
}

/**
 * Initialize a new store at the given location.
 */
export function initStore(
  rootPath: string,
  options: { stealth?: boolean; visible?: boolean } = {},
): StoreLocation {
  const storeDirName = options.visible ? VISIBLE_STORE_DIR : STORE_DIR;
  const storePath = path.join(rootPath, storeDirName);

  fs.mkdirSync(path.join(storePath, NOTES_DIR), { recursive: true });

  const configPath = path.join(storePath, CONFIG_FILE);
  if (!fs.existsSync(configPath)) {
    const configContent = `# Marknote store configuration
format_version = ${DEFAULT_CONFIG.format_version}
stats_limit = ${DEFAULT_CONFIG.stats_limit}
path_max_depth = ${DEFAULT_CONFIG.path_max_depth}
`;
    fs.writeFileSync(configPath, configContent);
  }

  // Stealth mode keeps the store out of the parent repository
  if (options.stealth) {
    const parentGitignore = path.join(rootPath, ".gitignore");
    const ignoreEntry = `${storeDirName}/\n`;
    if (fs.existsSync(parentGitignore)) {
      const content = fs.readFileSync(parentGitignore, "utf-8");
      if (!content.split("\n").includes(`${storeDirName}/`)) {
        const separator = content.length > 0 && !content.endsWith("\n") ? "\n" : "";
        fs.appendFileSync(parentGitignore, separator + ignoreEntry);
      }
    } else {
      fs.writeFileSync(parentGitignore, ignoreEntry);
    }
  }

  return { storePath, rootPath };
}

function readConfigNumber(
  parsed: Record<string, unknown>,
  key: keyof StoreConfig,
): number {
  const value = parsed[key];
  if (value === undefined) return DEFAULT_CONFIG[key];
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(
      `Invalid ${CONFIG_FILE}: "${key}" must be a non-negative integer`,
    );
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load store configuration, filling in defaults for missing keys.
 */
export function loadConfig(storePath: string): Required<StoreConfig> {
  const configPath = path.join(storePath, CONFIG_FILE);
  if (!fs.existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  let parsed: unknown;
  try {
    parsed = toml.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid ${CONFIG_FILE}: ${message}`, { cause: err });
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Invalid ${CONFIG_FILE}: expected a table`);
  }

  return {
    format_version: readConfigNumber(parsed, "format_version"),
    stats_limit: readConfigNumber(parsed, "stats_limit"),
    path_max_depth: readConfigNumber(parsed, "path_max_depth"),
  };
}

/**
 * Generate a URL-safe slug from a title.
 */
export function slugify(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "")
    .slice(0, 50)
    .replace(/-$/, "");
}

/**
 * Generate the filename for a note.
 * Titles without any slug-able characters get a stable hash-based name.
 */
export function noteFilename(title: string): string {
  const slug = slugify(title);
  if (slug) return `${slug}.md`;

  const hash = crypto.createHash("sha256").update(title).digest("hex");
  return `note-${hash.slice(0, 8)}.md`;
}

function readString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  // js-yaml turns unquoted timestamps into Date objects
  if (value instanceof Date) return value.toISOString();
  return undefined;
}

function readStringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const items: string[] = [];
  for (const item of value) {
    const str = readString(item);
    if (str !== undefined) items.push(str);
  }
  return items;
}

/**
 * Parse a note file from its content. The category is taken from the
 * directory the file was found in, never from the frontmatter.
 */
export function parseNote(
  content: string,
  options: { fallbackTitle: string; category?: string; filePath?: string },
): Note {
  // Passing options bypasses gray-matter's per-content cache, which would
  // otherwise hand back stale data after a failed parse
  const { data, content: body } = matter(content, {});
  const raw: Record<string, unknown> = data;

  const frontmatter: NoteFrontmatter = {
    title: readString(raw.title) ?? options.fallbackTitle,
  };
  if (options.category) frontmatter.category = options.category;

  const created = readString(raw.created);
  if (created) frontmatter.created = created;
  const updated = readString(raw.updated);
  if (updated) frontmatter.updated = updated;
  const tags = readStringList(raw.tags);
  if (tags) frontmatter.tags = tags;
  const links = readStringList(raw.linked_notes);
  if (links) frontmatter.linked_notes = links;

  return {
    identity: makeIdentity(frontmatter.title, options.category),
    frontmatter,
    body: body.trim(),
    path: options.filePath,
  };
}

/**
 * Serialize a note to file content.
 * Uses deterministic key ordering for stable output.
 */
export function serializeNote(note: Note): string {
  const fm = note.frontmatter;

  const ordered: Record<string, unknown> = {};
  ordered.title = fm.title;
  if (note.identity.category) ordered.category = note.identity.category;
  if (fm.created) ordered.created = fm.created;
  if (fm.updated) ordered.updated = fm.updated;
  if (fm.tags && fm.tags.length > 0) ordered.tags = fm.tags;
  if (fm.linked_notes && fm.linked_notes.length > 0) {
    ordered.linked_notes = fm.linked_notes;
  }

  return matter.stringify(note.body ? `${note.body}\n` : "", ordered);
}

/**
 * Read a note from a file path.
 */
export function readNote(filePath: string, category?: string): Note {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new StoreIOError(`Cannot read note file: ${filePath}`, filePath, err);
  }

  try {
    return parseNote(content, {
      fallbackTitle: path.basename(filePath, ".md"),
      category,
      filePath,
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new StoreIOError(
      `Cannot parse note file ${filePath}: ${message}`,
      filePath,
      err,
    );
  }
}

/**
 * Write a note to a file path, creating its directory if needed.
 */
export function writeNote(note: Note, filePath: string): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, serializeNote(note));
  } catch (err) {
    throw new StoreIOError(`Cannot write note file: ${filePath}`, filePath, err);
  }
}

/**
 * The operations the link graph needs from a note collection.
 */
export interface NoteStore {
  /** Find a note; a missing category searches every category. */
  resolve(identity: NoteIdentity): Note | null;
  /** Like resolve, but throws NoteNotFoundError. */
  load(identity: NoteIdentity): Note;
  /** Persist a note, throwing StoreIOError on failure. */
  save(note: Note): void;
  /** All notes in scope, sorted by identity key. */
  enumerate(scope?: Scope): Note[];
}

export interface FileNoteStoreOptions {
  /** Receives a message for every note file that had to be skipped */
  warn?: (message: string) => void;
}

/**
 * Note store backed by Markdown files under `<store>/notes/`.
 */
export class FileNoteStore implements NoteStore {
  readonly storePath: string;
  readonly notesPath: string;
  private readonly warn: (message: string) => void;

  constructor(storePath: string, options: FileNoteStoreOptions = {}) {
    this.storePath = storePath;
    this.notesPath = path.join(storePath, NOTES_DIR);
    this.warn = options.warn ?? (() => undefined);
  }

  /**
   * Category directory names, sorted.
   */
  categories(): string[] {
    if (!fs.existsSync(this.notesPath)) return [];

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(this.notesPath, { withFileTypes: true });
    } catch (err) {
      throw new StoreIOError(
        `Cannot list categories in ${this.notesPath}`,
        this.notesPath,
        err,
      );
    }

    return entries
      .filter((e) => e.isDirectory() && !e.name.startsWith("."))
      .map((e) => e.name)
      .sort();
  }

  /**
   * Path where a note with this identity is (or would be) stored.
   */
  notePath(identity: NoteIdentity): string {
    const dir = identity.category
      ? path.join(this.notesPath, identity.category)
      : this.notesPath;
    return path.join(dir, noteFilename(identity.title));
  }

  resolve(identity: NoteIdentity): Note | null {
    const categories: Array<string | undefined> =
      identity.category !== undefined
        ? [identity.category]
        : [undefined, ...this.categories()];

    for (const category of categories) {
      const note = this.findInDirectory(identity.title, category);
      if (note) return note;
    }

    return null;
  }

  load(identity: NoteIdentity): Note {
    const note = this.resolve(identity);
    if (!note) {
      throw new NoteNotFoundError(identity);
    }
    return note;
  }

  save(note: Note): void {
    writeNote(note, note.path ?? this.notePath(note.identity));
  }

  enumerate(scope: Scope = {}): Note[] {
    const categories: Array<string | undefined> = scope.category
      ? [scope.category]
      : [undefined, ...this.categories()];

    const notes: Note[] = [];
    for (const category of categories) {
      notes.push(...this.readDirectory(category));
    }

    notes.sort((a, b) => compareIdentities(a.identity, b.identity));
    return notes;
  }

  /**
   * Create a new note and save it to the store. Initial links are written
   * as identity keys; see canonicalLinks.
   */
  create(options: {
    title: string;
    category?: string;
    tags?: string[];
    body?: string;
    linkedNotes?: string[];
  }): Note {
    const title = options.title.trim();
    if (!title) {
      throw new MarknoteError("Note title cannot be empty", ExitCodes.USAGE_ERROR);
    }
    if (
      options.category !== undefined &&
      (!options.category ||
        /[\\/]/.test(options.category) ||
        options.category.startsWith("."))
    ) {
      throw new MarknoteError(
        `Invalid category name: "${options.category}"`,
        ExitCodes.USAGE_ERROR,
      );
    }

    const identity = makeIdentity(title, options.category);
    const filePath = this.notePath(identity);
    if (fs.existsSync(filePath)) {
      throw new MarknoteError(
        `A note with the title "${formatIdentity(identity)}" already exists`,
        ExitCodes.DATA_ERROR,
      );
    }

    const now = new Date().toISOString();
    const frontmatter: NoteFrontmatter = {
      title,
      created: now,
      updated: now,
    };
    if (identity.category) frontmatter.category = identity.category;
    if (options.tags && options.tags.length > 0) {
      frontmatter.tags = options.tags;
    }

    const note: Note = {
      identity,
      frontmatter,
      body: options.body ?? `# ${title}`,
      path: filePath,
    };

    if (options.linkedNotes && options.linkedNotes.length > 0) {
      const lookup = new NoteLookup([...this.enumerate(), note]);
      const links = canonicalLinks(lookup, identity, options.linkedNotes);
      if (links.length > 0) frontmatter.linked_notes = links;
    }

    writeNote(note, filePath);

    return note;
  }

  private directoryFor(category?: string): string {
    return category ? path.join(this.notesPath, category) : this.notesPath;
  }

  private markdownFiles(dir: string): string[] {
    if (!isDirectory(dir)) return [];
    try {
      return fs
        .readdirSync(dir)
        .filter((f) => f.endsWith(".md"))
        .sort();
    } catch (err) {
      throw new StoreIOError(`Cannot list notes in ${dir}`, dir, err);
    }
  }

  private readDirectory(category?: string): Note[] {
    const dir = this.directoryFor(category);
    const notes: Note[] = [];
    const seen = new Set<string>();

    for (const file of this.markdownFiles(dir)) {
      const filePath = path.join(dir, file);
      let note: Note;
      try {
        note = readNote(filePath, category);
      } catch (err) {
        if (!(err instanceof StoreIOError)) throw err;
        this.warn(`Skipping ${filePath}: ${err.message}`);
        continue;
      }

      const key = formatIdentity(note.identity);
      if (seen.has(key)) {
        this.warn(`Skipping ${filePath}: duplicate note "${key}"`);
        continue;
      }
      seen.add(key);
      notes.push(note);
    }

    return notes;
  }

  private findInDirectory(title: string, category?: string): Note | null {
    const direct = this.notePath(makeIdentity(title, category));
    if (fs.existsSync(direct)) {
      try {
        const note = readNote(direct, category);
        if (note.frontmatter.title === title) return note;
      } catch (err) {
        // The directory scan below skips and reports the broken file
        if (!(err instanceof StoreIOError)) throw err;
      }
    }

    // Hand-renamed notes no longer match their filename
    return (
      this.readDirectory(category).find(
        (n) => n.frontmatter.title === title,
      ) ?? null
    );
  }
}

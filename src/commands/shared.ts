/**
 * Plumbing shared by every command: global options, store resolution and
 * error reporting.
 */

import { Command, InvalidArgumentError } from "commander";
import { ExitCodes } from "../lib/models.js";
import type { NoteIdentity, StoreConfig } from "../lib/models.js";
import { FileNoteStore, loadConfig, resolveStore } from "../lib/storage.js";
import type { StoreLocation } from "../lib/storage.js";
import { MarknoteError, StoreNotFoundError } from "../lib/errors.js";
import { makeIdentity } from "../lib/identity.js";
import { createLogger } from "../lib/logger.js";
import type { Logger } from "../lib/logger.js";

export interface GlobalOptions {
  store?: string;
  root?: string;
  json: boolean;
  quiet: boolean;
  verbose: boolean;
}

export interface CommandContext {
  globals: GlobalOptions;
  location: StoreLocation;
  store: FileNoteStore;
  config: Required<StoreConfig>;
  log: Logger;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Read the program-level options from any (sub)command.
 */
export function readGlobals(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  return {
    store: optionalString(opts.store),
    root: optionalString(opts.root),
    json: opts.json === true,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
  };
}

/**
 * Resolve the store for a command, load its config and wire the logger into
 * the note store so skipped files are reported.
 */
export function openStore(command: Command): CommandContext {
  const globals = readGlobals(command);
  const log = createLogger(globals);

  const location = resolveStore({ store: globals.store, root: globals.root });
  if (!location) {
    throw new StoreNotFoundError();
  }

  const config = loadConfig(location.storePath);
  const store = new FileNoteStore(location.storePath, {
    warn: (message) => log.warn(message),
  });
  log.debug(`store: ${location.storePath}`);

  return { globals, location, store, config, log };
}

/**
 * Print an error in the selected output mode and exit with its code.
 */
export function exitWithError(globals: GlobalOptions, err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  const kind = err instanceof Error ? err.name : "Error";
  const exitCode =
    err instanceof MarknoteError ? err.exitCode : ExitCodes.FAILURE;

  if (globals.json) {
    console.log(JSON.stringify({ status: "error", error: message, kind }));
  } else {
    console.error(`Error: ${message}`);
  }

  if (process.env.DEBUG && err instanceof Error && err.stack) {
    console.error(err.stack);
  }

  process.exit(exitCode);
}

/**
 * Run a command body, exiting 0 on success and with the error's own code on
 * failure.
 */
export function runAction(command: Command, body: () => void): void {
  try {
    body();
  } catch (err) {
    exitWithError(readGlobals(command), err);
  }
  process.exit(ExitCodes.SUCCESS);
}

/**
 * Build an identity from a title argument and an optional category option.
 */
export function identityFrom(title: string, category: unknown): NoteIdentity {
  return makeIdentity(title, optionalString(category));
}

/**
 * Commander argument parser for non-negative integers.
 */
export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

/**
 * Commander collector for repeatable, comma-separated options.
 */
export function collectList(value: string, previous: string[]): string[] {
  return previous.concat(
    value
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
  );
}

/**
 * Error types raised by the store and the link graph.
 *
 * Every domain failure extends MarknoteError and carries the exit code the
 * CLI reports for it.
 */

import { ExitCodes } from "./models.js";
import type { ExitCode, NoteIdentity } from "./models.js";
import { formatIdentity } from "./identity.js";

export class MarknoteError extends Error {
  readonly exitCode: ExitCode;

  constructor(
    message: string,
    exitCode: ExitCode = ExitCodes.FAILURE,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MarknoteError";
    this.exitCode = exitCode;
  }
}

export class StoreNotFoundError extends MarknoteError {
  constructor() {
    super('No store found. Run "marknote init" first.', ExitCodes.DATA_ERROR);
    this.name = "StoreNotFoundError";
  }
}

export class ConfigError extends MarknoteError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ExitCodes.DATA_ERROR, options);
    this.name = "ConfigError";
  }
}

export class NoteNotFoundError extends MarknoteError {
  readonly identity: NoteIdentity;

  constructor(identity: NoteIdentity) {
    super(`Note not found: ${formatIdentity(identity)}`, ExitCodes.DATA_ERROR);
    this.name = "NoteNotFoundError";
    this.identity = identity;
  }
}

export class SelfLinkError extends MarknoteError {
  constructor(identity: NoteIdentity) {
    super(
      `Cannot link a note to itself: ${formatIdentity(identity)}`,
      ExitCodes.USAGE_ERROR,
    );
    this.name = "SelfLinkError";
  }
}

export class AlreadyLinkedError extends MarknoteError {
  constructor(source: NoteIdentity, target: NoteIdentity) {
    super(
      `Link already exists: ${formatIdentity(source)} -> ${formatIdentity(target)}`,
    );
    this.name = "AlreadyLinkedError";
  }
}

export class LinkNotFoundError extends MarknoteError {
  constructor(source: NoteIdentity, target: NoteIdentity) {
    super(
      `No link exists between ${formatIdentity(source)} and ${formatIdentity(target)}`,
      ExitCodes.DATA_ERROR,
    );
    this.name = "LinkNotFoundError";
  }
}

/**
 * Wraps a failed filesystem read or write. The original error is kept as
 * `cause`.
 */
export class StoreIOError extends MarknoteError {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, ExitCodes.FAILURE, { cause });
    this.name = "StoreIOError";
    this.filePath = filePath;
  }
}

/** Which half of a (possibly bidirectional) link a write touched. */
export type LinkDirection = "forward" | "reverse";

/**
 * A bidirectional mutation persisted one direction and then failed on the
 * other. `persisted` lists what reached disk so the caller can repair.
 */
export class PartialLinkError extends MarknoteError {
  readonly persisted: LinkDirection[];
  readonly failed: LinkDirection;

  constructor(
    operation: "add" | "remove",
    persisted: LinkDirection[],
    failed: LinkDirection,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Link ${operation} incomplete: ${persisted.join(", ")} saved, ${failed} failed (${reason})`,
      ExitCodes.FAILURE,
      { cause },
    );
    this.name = "PartialLinkError";
    this.persisted = persisted;
    this.failed = failed;
  }
}

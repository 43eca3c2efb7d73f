/**
 * End-to-end tests for the command tree.
 *
 * Why: the lib tests never go through commander, so option wiring, the exit
 * code of each error and the `--json` error shape are only checked here.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { buildProgram } from "./program.js";
import { FileNoteStore, initStore } from "./lib/storage.js";

class ExitCalled extends Error {
  constructor(readonly code: number) {
    super(`process.exit(${code})`);
  }
}

interface RunResult {
  code: number;
  stdout: string[];
  stderr: string[];
}

function run(args: string[]): RunResult {
  const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
  const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
  vi.spyOn(process, "exit").mockImplementation((code) => {
    throw new ExitCalled(Number(code ?? 0));
  });

  let code = -1;
  try {
    buildProgram().parse(args, { from: "user" });
  } catch (err) {
    if (!(err instanceof ExitCalled)) throw err;
    code = err.code;
  }

  return {
    code,
    stdout: log.mock.calls.map((call) => call.map(String).join(" ")),
    stderr: error.mock.calls.map((call) => call.map(String).join(" ")),
  };
}

describe("marknote CLI", () => {
  let tempDir: string;
  let storePath: string;
  let store: FileNoteStore;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "marknote-test-"));
    storePath = initStore(tempDir).storePath;
    store = new FileNoteStore(storePath);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("link add", () => {
    beforeEach(() => {
      store.create({ title: "A" });
      store.create({ title: "B" });
    });

    it("should link two notes and exit 0", () => {
      const result = run(["--store", storePath, "link", "add", "A", "B"]);

      expect(result).toEqual({ code: 0, stdout: ["Linked A -> B"], stderr: [] });
      expect(store.load({ title: "A" }).frontmatter.linked_notes).toEqual(["B"]);
    });

    it("should print a JSON error and exit 3 for a missing target", () => {
      const result = run(["--store", storePath, "--json", "link", "add", "A", "Ghost"]);

      expect(result.code).toBe(3);
      expect(result.stdout).toHaveLength(1);
      expect(JSON.parse(result.stdout[0])).toEqual({
        status: "error",
        error: "Note not found: Ghost",
        kind: "NoteNotFoundError",
      });
    });

    it("should report a self-link on stderr and exit 2", () => {
      const result = run(["--store", storePath, "link", "add", "A", "A"]);

      expect(result.code).toBe(2);
      expect(result.stdout).toEqual([]);
      expect(result.stderr).toEqual(["Error: Cannot link a note to itself: A"]);
    });
  });

  describe("network path --json", () => {
    beforeEach(() => {
      store.create({ title: "A", linkedNotes: ["B"] });
      store.create({ title: "B", linkedNotes: ["C"] });
      store.create({ title: "C", linkedNotes: ["D"] });
      store.create({ title: "D" });
    });

    it("should print the path found", () => {
      const result = run(["--store", storePath, "--json", "network", "path", "A", "C"]);

      expect(result.code).toBe(0);
      expect(JSON.parse(result.stdout[0])).toEqual({
        source: { title: "A", category: null },
        target: { title: "C", category: null },
        found: true,
        length: 2,
        path: [
          { title: "A", category: null },
          { title: "B", category: null },
          { title: "C", category: null },
        ],
        reason: null,
      });
    });

    it("should pass --max-depth through to the search", () => {
      const result = run([
        "--store",
        storePath,
        "--json",
        "network",
        "path",
        "A",
        "D",
        "--max-depth",
        "1",
      ]);

      expect(result.code).toBe(0);
      expect(JSON.parse(result.stdout[0])).toMatchObject({
        found: false,
        length: null,
        path: null,
        reason: "depth-exceeded",
      });
    });
  });

  it("should exit 3 when no store exists", () => {
    const result = run(["--store", path.join(tempDir, "missing"), "network", "stats"]);

    expect(result.code).toBe(3);
    expect(result.stderr).toEqual(['Error: No store found. Run "marknote init" first.']);
  });
});

/**
 * Tests for note search.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { FileNoteStore, initStore } from "./storage.js";
import { matchNote, searchNotes } from "./search.js";
import { formatIdentity } from "./identity.js";
import type { SearchMatch } from "./search.js";

function keys(matches: SearchMatch[]): string[] {
  return matches.map((m) => formatIdentity(m.note.identity));
}

describe("matchNote", () => {
  const note = {
    identity: { title: "Garden Log" },
    frontmatter: { title: "Garden Log", tags: ["outdoor", "Garden"] },
    body: "Watered the garden.",
  };

  it("should list every field containing the query", () => {
    expect(matchNote(note, "garden")).toEqual(["title", "tag", "body"]);
  });

  it("should match only the fields that contain the query", () => {
    expect(matchNote(note, "outdoor")).toEqual(["tag"]);
    expect(matchNote(note, "watered")).toEqual(["body"]);
  });

  it("should return nothing for a note without the query", () => {
    expect(matchNote(note, "kitchen")).toEqual([]);
  });
});

describe("searchNotes", () => {
  let tempDir: string;
  let store: FileNoteStore;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "marknote-test-"));
    const { storePath } = initStore(tempDir);
    store = new FileNoteStore(storePath);

    store.create({ title: "Allotment", body: "Start the garden beds." });
    store.create({
      title: "Batch Cooking",
      tags: ["garden-produce"],
      body: "Cook what grows.",
    });
    store.create({ title: "Gardening", tags: ["outdoor"], body: "Plant in spring." });
    store.create({ title: "Travel", tags: ["work"], body: "Pack light." });
    store.create({ title: "Garden Tools", category: "work", body: "Spade." });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should rank title matches before tag matches before body matches", () => {
    const matches = searchNotes(store, "garden");

    expect(keys(matches)).toEqual([
      "Gardening",
      "work/Garden Tools",
      "Batch Cooking",
      "Allotment",
    ]);
    expect(matches.map((m) => m.fields)).toEqual([
      ["title"],
      ["title"],
      ["tag"],
      ["body"],
    ]);
  });

  it("should ignore case", () => {
    expect(keys(searchNotes(store, "GARDEN"))).toEqual(keys(searchNotes(store, "garden")));
  });

  it("should trim the query", () => {
    expect(keys(searchNotes(store, "  pack  "))).toEqual(["Travel"]);
  });

  it("should only search the scope's category", () => {
    expect(keys(searchNotes(store, "garden", { scope: { category: "work" } }))).toEqual([
      "work/Garden Tools",
    ]);
  });

  it("should filter by exact tag", () => {
    expect(keys(searchNotes(store, "garden", { tag: "garden-produce" }))).toEqual([
      "Batch Cooking",
    ]);
    expect(searchNotes(store, "garden", { tag: "garden" })).toEqual([]);
  });

  it("should apply the limit after ranking", () => {
    expect(keys(searchNotes(store, "garden", { limit: 2 }))).toEqual([
      "Gardening",
      "work/Garden Tools",
    ]);
    expect(searchNotes(store, "garden", { limit: 0 })).toHaveLength(4);
  });

  it("should reject an empty query", () => {
    expect(() => searchNotes(store, "   ")).toThrow("Search query cannot be empty");
  });
});

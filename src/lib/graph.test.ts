/**
 * Tests for link graph construction.
 */

import { describe, it, expect } from "vitest";
import { LinkGraph, NoteLookup } from "./graph.js";
import { formatIdentity, makeIdentity } from "./identity.js";
import type { Note } from "./models.js";

function note(key: string, links: string[] = []): Note {
  const slash = key.indexOf("/");
  const identity =
    slash > 0
      ? makeIdentity(key.slice(slash + 1), key.slice(0, slash))
      : makeIdentity(key);
  return {
    identity,
    frontmatter: { title: identity.title, linked_notes: links },
    body: "",
  };
}

const keys = (ids: Array<{ title: string; category?: string }>) =>
  ids.map(formatIdentity);

describe("NoteLookup", () => {
  it("should resolve qualified references exactly", () => {
    const lookup = new NoteLookup([note("work/Plan"), note("Plan")]);

    expect(lookup.resolve({ title: "Plan", category: "work" })?.identity).toEqual({
      title: "Plan",
      category: "work",
    });
    expect(lookup.resolve({ title: "Plan", category: "home" })).toBeUndefined();
  });

  it("should prefer the uncategorized note for a bare title", () => {
    const lookup = new NoteLookup([note("work/Plan"), note("Plan"), note("archive/Plan")]);

    expect(lookup.resolve({ title: "Plan" })?.identity).toEqual({ title: "Plan" });
  });

  it("should fall back to the first category in order", () => {
    const lookup = new NoteLookup([note("work/Plan"), note("archive/Plan")]);

    expect(lookup.resolve({ title: "Plan" })?.identity.category).toBe("archive");
  });

  it("should not match titles case-insensitively", () => {
    const lookup = new NoteLookup([note("Plan")]);

    expect(lookup.resolve({ title: "plan" })).toBeUndefined();
    expect(lookup.has({ title: "Plan" })).toBe(true);
    expect(lookup.has({ title: "plan" })).toBe(false);
  });
});

describe("LinkGraph", () => {
  it("should build sorted adjacency lists", () => {
    const graph = new LinkGraph([
      note("A", ["C", "B"]),
      note("B", ["C"]),
      note("C"),
    ]);

    expect(keys(graph.outgoing({ title: "A" }))).toEqual(["B", "C"]);
    expect(keys(graph.incoming({ title: "C" }))).toEqual(["A", "B"]);
    expect(graph.edgeCount()).toBe(3);
  });

  it("should count dangling entries in out-degree and report them as orphaned", () => {
    const graph = new LinkGraph([note("A", ["B", "Ghost"]), note("B")]);

    expect(graph.outDegree({ title: "A" })).toBe(2);
    expect(keys(graph.outgoing({ title: "A" }))).toEqual(["B"]);
    expect(graph.orphaned).toEqual([
      { source: { title: "A" }, target: { title: "Ghost" } },
    ]);
  });

  it("should ignore duplicate entries and self-references", () => {
    const graph = new LinkGraph([
      note("A", ["B", "B", "A", "work/B"]),
      note("B"),
      note("work/B"),
    ]);

    expect(graph.outDegree({ title: "A" })).toBe(2);
    expect(keys(graph.outgoing({ title: "A" }))).toEqual(["B", "work/B"]);
  });

  it("should treat a bare entry and its qualified form as the same link", () => {
    const graph = new LinkGraph([note("A", ["Plan", "work/Plan"]), note("work/Plan")]);

    expect(graph.outDegree({ title: "A" })).toBe(1);
    expect(keys(graph.outgoing({ title: "A" }))).toEqual(["work/Plan"]);
  });

  it("should restrict nodes and edges to the scope", () => {
    const graph = new LinkGraph(
      [
        note("work/A", ["work/B", "Home"]),
        note("work/B"),
        note("Home", ["work/A"]),
      ],
      { category: "work" },
    );

    expect(keys(graph.notes.map((n) => n.identity))).toEqual(["work/A", "work/B"]);
    expect(graph.outDegree({ title: "A", category: "work" })).toBe(2);
    expect(keys(graph.outgoing({ title: "A", category: "work" }))).toEqual([
      "work/B",
    ]);
    expect(graph.inDegree({ title: "A", category: "work" })).toBe(0);
    expect(graph.orphaned).toEqual([]);
    expect(graph.has({ title: "Home" })).toBe(false);
  });

  it("should resolve entries against notes outside the scope", () => {
    const graph = new LinkGraph(
      [note("work/A", ["Home", "Missing"]), note("Home")],
      { category: "work" },
    );

    expect(graph.orphaned).toEqual([
      { source: { title: "A", category: "work" }, target: { title: "Missing" } },
    ]);
  });

  it("should report zero degrees for an isolated note", () => {
    const graph = new LinkGraph([note("Alone")]);

    expect(graph.outDegree({ title: "Alone" })).toBe(0);
    expect(graph.inDegree({ title: "Alone" })).toBe(0);
    expect(graph.outgoing({ title: "Alone" })).toEqual([]);
  });
});

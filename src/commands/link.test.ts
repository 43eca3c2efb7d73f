/**
 * Tests for link command output.
 *
 * Why: the text printed by `link add`, `link remove` and `link orphaned` is
 * what users read to tell whether a direction was created, already there, or
 * missing.
 */

import { describe, it, expect } from "vitest";
import { formatAddResult, formatRemoveResult, formatOrphans } from "./link.js";

const A = { title: "A" };
const B = { title: "B", category: "work" };

describe("formatAddResult", () => {
  it("should describe a new one-way link", () => {
    expect(formatAddResult({ source: A, target: B, forward: "created" })).toBe(
      "Linked A -> work/B",
    );
  });

  it("should describe an existing one-way link", () => {
    expect(formatAddResult({ source: A, target: B, forward: "exists" })).toBe(
      "Already linked: A -> work/B",
    );
  });

  it("should describe a new bidirectional link", () => {
    expect(
      formatAddResult({ source: A, target: B, forward: "created", reverse: "created" }),
    ).toBe("Linked A <-> work/B");
  });

  it("should mention the direction that already existed", () => {
    expect(
      formatAddResult({ source: A, target: B, forward: "exists", reverse: "created" }),
    ).toBe("Linked A <-> work/B (A -> work/B already existed)");
    expect(
      formatAddResult({ source: A, target: B, forward: "created", reverse: "exists" }),
    ).toBe("Linked A <-> work/B (work/B -> A already existed)");
  });

  it("should report a bidirectional link that fully existed", () => {
    expect(
      formatAddResult({ source: A, target: B, forward: "exists", reverse: "exists" }),
    ).toBe("Already linked: A <-> work/B");
  });
});

describe("formatRemoveResult", () => {
  it("should describe a one-way removal", () => {
    expect(formatRemoveResult({ source: A, target: B, forward: "removed" })).toBe(
      "Removed link A -> work/B",
    );
  });

  it("should describe a bidirectional removal", () => {
    expect(
      formatRemoveResult({ source: A, target: B, forward: "removed", reverse: "removed" }),
    ).toBe("Removed link A <-> work/B");
  });

  it("should mention the direction that was not present", () => {
    expect(
      formatRemoveResult({ source: A, target: B, forward: "absent", reverse: "removed" }),
    ).toBe("Removed link A <-> work/B (A -> work/B was not present)");
  });
});

describe("formatOrphans", () => {
  it("should say when there is nothing to report", () => {
    expect(formatOrphans([])).toBe("No orphaned links found.");
  });

  it("should group dangling targets by source", () => {
    const output = formatOrphans([
      { source: A, target: { title: "Ghost" } },
      { source: A, target: { title: "Gone", category: "old" } },
      { source: B, target: { title: "Lost" } },
    ]);

    expect(output).toBe(
      ["Orphaned links:", "  A -> Ghost, old/Gone", "  work/B -> Lost"].join("\n"),
    );
  });
});

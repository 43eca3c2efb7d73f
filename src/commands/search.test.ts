/**
 * Tests for search command output.
 */

import { describe, it, expect } from "vitest";
import { formatMatch, formatSearchResults } from "./search.js";
import type { SearchMatch } from "../lib/search.js";

const plan: SearchMatch = {
  note: {
    identity: { title: "Plan", category: "work" },
    frontmatter: { title: "Plan", category: "work", tags: ["q3", "draft"] },
    body: "",
  },
  fields: ["title", "tag"],
};

const notes: SearchMatch = {
  note: { identity: { title: "Notes" }, frontmatter: { title: "Notes" }, body: "plan" },
  fields: ["body"],
};

describe("formatMatch", () => {
  it("should show the key, matched fields and tags", () => {
    expect(formatMatch(plan)).toBe("work/Plan (title, tag) [q3, draft]");
  });

  it("should leave out an empty tag list", () => {
    expect(formatMatch(notes)).toBe("Notes (body)");
  });
});

describe("formatSearchResults", () => {
  it("should say when nothing matched", () => {
    expect(formatSearchResults("plan", [])).toBe("No notes found matching 'plan'");
  });

  it("should use the singular for one result", () => {
    expect(formatSearchResults("plan", [notes])).toBe(
      "Found 1 note matching 'plan':\n  Notes (body)",
    );
  });

  it("should list every result", () => {
    expect(formatSearchResults("plan", [plan, notes])).toBe(
      [
        "Found 2 notes matching 'plan':",
        "  work/Plan (title, tag) [q3, draft]",
        "  Notes (body)",
      ].join("\n"),
    );
  });
});

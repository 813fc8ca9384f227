import { describe, test, expect } from "vitest";
import { addedLineTexts, fileDiffFromPatch, parseUnifiedPatch } from "./patch-parser.ts";

const PATCH = [
  "@@ -10,4 +10,5 @@ def fetch(url):",
  "     session = make_session()",
  "-    return session.get(url)",
  "+    for attempt in range(3):",
  "+        return session.get(url)",
  "",
  "     # done",
  "@@ -40 +41,2 @@",
  "--- removed dashes",
  "+++ added pluses",
  "+tail",
  "\\ No newline at end of file",
].join("\n");

describe("parseUnifiedPatch", () => {
  test("returns no hunks for an empty or missing patch", () => {
    expect(parseUnifiedPatch("")).toEqual([]);
    expect(parseUnifiedPatch(null)).toEqual([]);
  });

  test("numbers added, context and removed lines", () => {
    const [first] = parseUnifiedPatch(PATCH);

    expect(first?.oldStart).toBe(10);
    expect(first?.newStart).toBe(10);
    expect(first?.header).toBe("def fetch(url):");
    expect(first?.lines).toEqual([
      { kind: "context", newLine: 10, text: "    session = make_session()" },
      { kind: "removed", oldLine: 11, text: "    return session.get(url)" },
      { kind: "added", newLine: 11, text: "    for attempt in range(3):" },
      { kind: "added", newLine: 12, text: "        return session.get(url)" },
      { kind: "context", newLine: 13, text: "" },
      { kind: "context", newLine: 14, text: "    # done" },
    ]);
  });

  test("header-like lines inside a hunk are content", () => {
    const hunks = parseUnifiedPatch(PATCH);

    expect(hunks).toHaveLength(2);
    expect(hunks[1]?.lines).toEqual([
      { kind: "removed", oldLine: 40, text: "-- removed dashes" },
      { kind: "added", newLine: 41, text: "++ added pluses" },
      { kind: "added", newLine: 42, text: "tail" },
    ]);
  });

  test("ignores file headers before the first hunk", () => {
    const hunks = parseUnifiedPatch("diff --git a/x b/x\n--- a/x\n+++ b/x\n@@ -1 +1 @@\n-a\n+b");
    expect(hunks[0]?.lines).toEqual([
      { kind: "removed", oldLine: 1, text: "a" },
      { kind: "added", newLine: 1, text: "b" },
    ]);
  });
});

describe("addedLineTexts", () => {
  test("lists added line texts in diff order", () => {
    expect(addedLineTexts(fileDiffFromPatch("x.py", PATCH))).toEqual([
      "    for attempt in range(3):",
      "        return session.get(url)",
      "++ added pluses",
      "tail",
    ]);
  });
});

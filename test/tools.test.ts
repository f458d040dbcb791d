import { describe, it, expect } from "vitest";
import {
  compactToolCalls,
  filterToolsByLevel,
  summarizeEdit,
  summarizeToolArgs,
} from "../src/tools.js";
import { makeMessage, toolCall } from "./helpers/messages.js";

describe("summarizeEdit", () => {
  it("describes additions", () => {
    expect(summarizeEdit("", "const x = 1")).toBe("added: const x = 1");
    expect(summarizeEdit("", "a".repeat(45))).toBe(`added: ${"a".repeat(40)}...`);
    expect(summarizeEdit("", "a\nb\nc")).toBe("added 3 lines");
  });

  it("describes deletions", () => {
    expect(summarizeEdit("x", "")).toBe("deleted line");
    expect(summarizeEdit("x\ny", "")).toBe("deleted 2 lines");
  });

  it("names single line changes", () => {
    expect(summarizeEdit("function a() {", "function b() {")).toBe("renamed function");
    expect(summarizeEdit("class A {", "class B {")).toBe("renamed class");
    expect(summarizeEdit("import x from 'a'", "import y from 'a'")).toBe("changed import");
    expect(summarizeEdit("a = 1", "a = 2")).toBe("changed line");
  });

  it("compares line counts of larger changes", () => {
    expect(summarizeEdit("a\nb", "a\nb\nc")).toBe("expanded (+1 lines)");
    expect(summarizeEdit("a\nb\nc", "a")).toBe("reduced (-2 lines)");
    expect(summarizeEdit("a\nb", "c\nd")).toBe("modified 2 lines");
  });

  it("falls back when both sides are empty", () => {
    expect(summarizeEdit("", "")).toBe("modified");
  });
});

describe("summarizeToolArgs", () => {
  it("summarizes file tools by file name", () => {
    expect(
      summarizeToolArgs("Edit", { file_path: "/src/app.ts", old_string: "", new_string: "x = 1" }),
    ).toBe("app.ts (added: x = 1)");
    expect(summarizeToolArgs("MultiEdit", { file_path: "/src/app.ts", edits: [{}, {}] })).toBe(
      "app.ts (2 edits)",
    );
    expect(summarizeToolArgs("Write", { file_path: "/out.txt", content: "a\nb" })).toBe(
      "out.txt (2 lines)",
    );
    expect(summarizeToolArgs("Read", { file_path: "/src/app.ts" })).toBe("app.ts");
  });

  it("prefers a command's description", () => {
    expect(summarizeToolArgs("Bash", { command: "npm test" })).toBe("npm test");
    expect(summarizeToolArgs("Bash", { command: "npm test", description: "Run tests" })).toBe(
      "Run tests",
    );
  });

  it("shows search patterns and task descriptions", () => {
    expect(summarizeToolArgs("Grep", { pattern: "TODO" })).toBe("TODO");
    expect(summarizeToolArgs("Task", { description: "scan" })).toBe("scan");
  });

  it("returns nothing for other tools", () => {
    expect(summarizeToolArgs("WebFetch", { url: "https://example.com" })).toBe("");
  });
});

describe("compactToolCalls", () => {
  const calls = [
    toolCall("1", "Read", { file_path: "/src/a.ts" }),
    toolCall("2", "Edit", { file_path: "/src/a.ts", old_string: "x", new_string: "y" }),
    toolCall("3", "Bash", { command: "npm test" }),
    toolCall("4", "Bash", { command: "npm test" }),
    toolCall("5", "Grep", { pattern: "TODO" }),
    toolCall("6", "Task", { description: "scan" }),
    toolCall("7", "Write", { file_path: "/src/b.ts", content: "z" }),
    makeMessage({ uuid: "8", type: "assistant", content: "thinking out loud" }),
  ];

  it("groups file operations and drops repeats", () => {
    expect(compactToolCalls(calls, "normal")).toEqual([
      "Read + Edit: a.ts",
      "Write: b.ts",
      "Bash: npm test",
      "Grep: TODO",
      "Task: scan",
    ]);
  });

  it("keeps only files and commands at the minimal level", () => {
    expect(compactToolCalls(calls, "minimal")).toEqual([
      "Read + Edit: a.ts",
      "Write: b.ts",
      "Bash: npm test",
      "Bash: npm test",
    ]);
  });

  it("lists every call at the detailed level", () => {
    expect(compactToolCalls(calls, "detailed")).toEqual([
      "Read: a.ts",
      "Edit: a.ts (changed line)",
      "Bash: npm test",
      "Bash: npm test",
      "Grep: TODO",
      "Task: scan",
      "Write: b.ts (1 lines)",
    ]);
  });

  it("orders operations on a file the same way regardless of call order", () => {
    const reversed = [
      toolCall("1", "Write", { file_path: "/a.ts", content: "" }),
      toolCall("2", "Read", { file_path: "/a.ts" }),
    ];
    expect(compactToolCalls(reversed)).toEqual(["Read + Write: a.ts"]);
  });

  it("shortens long commands", () => {
    const long = "x".repeat(80);
    expect(compactToolCalls([toolCall("1", "Bash", { command: long })])).toEqual([
      `Bash: ${"x".repeat(50)}`,
    ]);
  });
});

describe("filterToolsByLevel", () => {
  const messages = [
    makeMessage({ uuid: "u", type: "user", content: "go" }),
    makeMessage({ uuid: "t", type: "assistant", content: "plain" }),
    toolCall("read", "Read", { file_path: "/a" }),
    toolCall("edit", "Edit", { file_path: "/a" }),
    toolCall("fetch", "WebFetch", { url: "https://example.com" }),
  ];

  it("keeps only changes and commands at the minimal level", () => {
    expect(filterToolsByLevel(messages, "minimal").map((m) => m.uuid)).toEqual(["u", "t", "edit"]);
  });

  it("adds reads and searches at the normal level", () => {
    expect(filterToolsByLevel(messages, "normal").map((m) => m.uuid)).toEqual([
      "u",
      "t",
      "read",
      "edit",
    ]);
  });

  it("keeps everything at the detailed level", () => {
    expect(filterToolsByLevel(messages, "detailed")).toHaveLength(5);
  });
});

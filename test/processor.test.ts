import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  assistantRecord,
  setupTranscriptAt,
  toolResult,
  toolUse,
  userRecord,
} from "./helpers/transcript.js";

const testDir = join(tmpdir(), `session-digest-processor-test-${Date.now()}`);

vi.mock("node:os", async (importOriginal) => {
  const original = await importOriginal<typeof import("node:os")>();
  return { ...original, homedir: () => testDir };
});

beforeEach(() => {
  if (existsSync(testDir)) rmSync(testDir, { recursive: true, force: true });
  mkdirSync(join(testDir, ".claude", "state"), { recursive: true });
});

afterEach(() => {
  if (existsSync(testDir)) {
    rmSync(testDir, { recursive: true, force: true });
  }
});

const { processSessionFiles } = await import("../src/processor.js");
const { LOG_FILE } = await import("../src/logger.js");

const SESSION = [
  userRecord("u1", "2025-01-01T10:00:00Z", "Fix the bug"),
  assistantRecord(
    "a1",
    "2025-01-01T10:00:01Z",
    [toolUse("t1", "Edit", { file_path: "a.ts" })],
    { input_tokens: 10, output_tokens: 5 },
  ),
  userRecord("u2", "2025-01-01T10:00:02Z", [toolResult("t1", "ok")]),
  assistantRecord("a2", "2025-01-01T10:00:03Z", [{ type: "text", text: "Fixed." }]),
  userRecord("u3", "2025-01-01T10:01:00Z", "Now add a test"),
];

describe("processSessionFiles", () => {
  it("turns a session file into turns", () => {
    const file = setupTranscriptAt(testDir, "one.jsonl", SESSION);
    const result = processSessionFiles([file]);

    expect(result.status).toBe("ok");
    if (result.status !== "ok") return;
    expect(result.turns).toHaveLength(2);
    expect(result.turns[0].assistantMessages.map((m) => m.uuid)).toEqual(["a1", "a2"]);
    expect(result.turns[0].totalTokens).toBe(15);
    expect(result.absorbed.map((m) => m.category)).toEqual(["tool_response"]);
    expect(result.failures).toEqual([]);
  });

  it("collapses a message repeated across files", () => {
    const record = userRecord("same", "2025-01-01T10:00:00Z", "hello");
    const first = setupTranscriptAt(testDir, "a.jsonl", [record]);
    const second = setupTranscriptAt(testDir, "b.jsonl", [record]);

    const result = processSessionFiles([first, second]);
    expect(result.status === "ok" && result.turns.length).toBe(1);
  });

  it("gives the same turns for overlapping continuation files", () => {
    const file = setupTranscriptAt(testDir, "one.jsonl", SESSION);
    const once = processSessionFiles([file]);
    const twice = processSessionFiles([file, file]);

    expect(once.status === "ok" && twice.status === "ok").toBe(true);
    if (once.status !== "ok" || twice.status !== "ok") return;
    expect(twice.turns).toHaveLength(once.turns.length);
    expect(twice.messages).toHaveLength(once.messages.length);
  });

  it("merges files in timestamp order", () => {
    const late = setupTranscriptAt(testDir, "late.jsonl", [
      userRecord("u9", "2025-01-02T09:00:00Z", "second day"),
    ]);
    const early = setupTranscriptAt(testDir, "early.jsonl", [
      userRecord("u1", "2025-01-01T09:00:00Z", "first day"),
    ]);

    const result = processSessionFiles([late, early]);
    if (result.status !== "ok") throw new Error("expected messages");
    expect(result.turns.map((t) => t.userMessage.content)).toEqual(["first day", "second day"]);
  });

  it("reports unreadable files and keeps going", () => {
    const good = setupTranscriptAt(testDir, "good.jsonl", SESSION);
    const missing = join(testDir, "missing.jsonl");

    const result = processSessionFiles([missing, good]);
    expect(result.status).toBe("ok");
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].filePath).toBe(missing);
    expect(readFileSync(LOG_FILE, "utf8")).toContain(`[ERROR] Failed to read ${missing}:`);
  });

  it("counts malformed lines", () => {
    const file = setupTranscriptAt(testDir, "bad.jsonl", [
      userRecord("u1", "2025-01-01T10:00:00Z", "hi"),
      "{broken",
    ]);
    expect(processSessionFiles([file]).invalidLines).toBe(1);
  });

  it("reports an empty result when nothing parses", () => {
    const file = setupTranscriptAt(testDir, "junk.jsonl", ["nope", "also nope"]);
    expect(processSessionFiles([file])).toEqual({
      status: "empty",
      failures: [],
      invalidLines: 2,
    });
  });

  it("reports an empty result for no files", () => {
    expect(processSessionFiles([])).toEqual({ status: "empty", failures: [], invalidLines: 0 });
  });
});

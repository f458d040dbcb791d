import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  langfuseTracingMock,
  mockObservationEnd,
  mockObservationUpdate,
  mockPropagateAttributes,
  mockStartObservation,
} from "./helpers/langfuse-mock.js";
import { makeMessage, makeTurn, toolCall } from "./helpers/messages.js";

const testDir = join(tmpdir(), `session-digest-summarizer-test-${Date.now()}`);

vi.mock("node:os", async (importOriginal) => {
  const original = await importOriginal<typeof import("node:os")>();
  return { ...original, homedir: () => testDir };
});

vi.mock("@langfuse/tracing", () => langfuseTracingMock());
vi.mock("@langfuse/otel", () => ({ LangfuseSpanProcessor: vi.fn() }));
vi.mock("@opentelemetry/sdk-node", () => ({ NodeSDK: vi.fn() }));

const mockQuery = vi.fn();
vi.mock("@anthropic-ai/claude-agent-sdk", () => ({ query: mockQuery }));

async function* replies(...messages: object[]) {
  for (const message of messages) yield message;
}

const success = (result: string) => ({
  type: "result",
  subtype: "success",
  result,
  usage: { input_tokens: 10, output_tokens: 5 },
});

beforeEach(() => {
  vi.clearAllMocks();
  if (existsSync(testDir)) rmSync(testDir, { recursive: true, force: true });
  mkdirSync(join(testDir, ".claude", "state"), { recursive: true });
});

afterEach(() => {
  if (existsSync(testDir)) {
    rmSync(testDir, { recursive: true, force: true });
  }
});

const {
  AgentSummarizer,
  OfflineSummarizer,
  buildSummaryContent,
  summarizeSession,
  systemPromptFor,
} = await import("../src/summarizer.js");
const { SummaryCache } = await import("../src/cache.js");
const { DEFAULT_MODEL } = await import("../src/config.js");
const { LOG_FILE } = await import("../src/logger.js");

const editTurn = () =>
  makeTurn({ assistantMessages: [toolCall("a1", "Edit", { file_path: "/src/a.ts" })] });
const EDIT_CONTENT = '[Tool: Edit with {"file_path":"/src/a.ts"}]';

describe("OfflineSummarizer", () => {
  const summarizer = new OfflineSummarizer();

  it("collects summaries and todo activity", async () => {
    const turn = makeTurn({
      assistantMessages: [toolCall("a1", "Edit", { file_path: "/src/a.ts" })],
      systemMessages: [makeMessage({ uuid: "s1", type: "system", content: "Running TodoWrite" })],
      toolMessages: [makeMessage({ uuid: "x1", type: "summary", content: "Fixed login" })],
    });

    expect(await summarizer.summarizeTurn(turn)).toEqual({
      summary: "Fixed login\nActivities:\nUpdated todo list with current tasks",
      toolCalls: ["Edit: /src/a.ts"],
    });
  });

  it("falls back to the tools used", async () => {
    const command = "c".repeat(60);
    const turn = makeTurn({
      assistantMessages: [
        toolCall("a1", "Edit", { file_path: "/src/a.ts" }),
        toolCall("a2", "Bash", { command }),
        toolCall("a3", "Grep", { pattern: "TODO" }),
      ],
    });

    expect(await summarizer.summarizeTurn(turn)).toEqual({
      summary: "Used tools: Edit, Bash, Grep",
      toolCalls: ["Edit: /src/a.ts", `Bash: ${"c".repeat(50)}...`, "Grep: pattern: TODO"],
    });
  });

  it("says so when the logs hold nothing", async () => {
    expect(await summarizer.summarizeTurn(makeTurn())).toEqual({
      summary: "No summary information available in logs.",
      toolCalls: [],
    });
  });
});

describe("buildSummaryContent", () => {
  it("keeps text, allowed tool calls and system notes", () => {
    const turn = makeTurn({
      assistantMessages: [
        makeMessage({ uuid: "a0", type: "assistant", content: [{ type: "text", text: "Looking" }] }),
        toolCall("a1", "Read", { file_path: "/a" }),
        toolCall("a2", "Edit", { file_path: "/a" }),
      ],
      systemMessages: [makeMessage({ uuid: "s1", type: "system", content: "hook ok" })],
    });

    expect(buildSummaryContent(turn, "minimal")).toBe(
      'Looking\n\n[Tool: Edit with {"file_path":"/a"}]\n\n[System: hook ok]',
    );
  });

  it("gives a different prompt per level", () => {
    expect(systemPromptFor("minimal")).not.toBe(systemPromptFor("detailed"));
  });
});

describe("AgentSummarizer", () => {
  const cwd = join(testDir, "work");

  it("summarizes through a single tool-less agent turn", async () => {
    mockQuery.mockImplementation(() => replies({ type: "system" }, success("  Edited a.ts  ")));
    const summarizer = new AgentSummarizer({ cwd });

    const result = await summarizer.summarizeTurn(editTurn(), "normal", "sess-1");

    expect(result).toEqual({ summary: "Edited a.ts", toolCalls: ["Edit: a.ts"], tokensUsed: 15 });
    expect(mockQuery).toHaveBeenCalledWith({
      prompt: `Summarize these Claude Code assistant actions:\n\n${EDIT_CONTENT}`,
      options: {
        systemPrompt: systemPromptFor("normal"),
        model: DEFAULT_MODEL,
        maxTurns: 1,
        allowedTools: [],
        cwd,
      },
    });
  });

  it("skips the model when there is nothing to summarize", async () => {
    const result = await new AgentSummarizer({ cwd }).summarizeTurn(makeTurn(), "normal", "s");
    expect(result).toEqual({ summary: "No relevant assistant actions found.", toolCalls: [] });
    expect(mockQuery).not.toHaveBeenCalled();
  });

  it("reuses cached summaries", async () => {
    mockQuery.mockImplementation(() => replies(success("Edited a.ts")));
    const cache = new SummaryCache(join(testDir, "cache"));
    const summarizer = new AgentSummarizer({ cache, cwd });

    await summarizer.summarizeTurn(editTurn(), "normal", "sess-1");
    const again = await summarizer.summarizeTurn(editTurn(), "normal", "sess-1");

    expect(mockQuery).toHaveBeenCalledTimes(1);
    expect(again).toEqual({ summary: "Edited a.ts", toolCalls: ["Edit: a.ts"], tokensUsed: 15 });
  });

  it("reports an unsuccessful agent run as an error", async () => {
    mockQuery.mockImplementation(() => replies({ type: "result", subtype: "error_max_turns" }));
    const cache = new SummaryCache(join(testDir, "cache"));

    const result = await new AgentSummarizer({ cache, cwd }).summarizeTurn(
      editTurn(),
      "normal",
      "sess-1",
    );

    expect(result).toEqual({
      summary: "",
      toolCalls: ["Edit: a.ts"],
      error: "Agent query ended with error_max_turns",
    });
    expect(cache.failedEntries("sess-1")).toHaveLength(1);
    expect(readFileSync(LOG_FILE, "utf8")).toContain(
      "[ERROR] Summarization failed for session sess-1: Agent query ended with error_max_turns",
    );
  });

  it("reports a run without a result", async () => {
    mockQuery.mockImplementation(() => replies({ type: "assistant" }));
    const result = await new AgentSummarizer({ cwd }).summarizeTurn(editTurn(), "minimal", "s");
    expect(result.error).toBe("Agent query returned no result");
  });

  it("reports errors thrown by the agent", async () => {
    mockQuery.mockImplementation(() => {
      throw new Error("not logged in");
    });
    const result = await new AgentSummarizer({ cwd }).summarizeTurn(editTurn(), "minimal", "s");
    expect(result.error).toBe("not logged in");
  });

  it("records a generation when traced", async () => {
    mockQuery.mockImplementation(() => replies(success("Edited a.ts")));
    await new AgentSummarizer({ cwd, traced: true, model: "test-model" }).summarizeTurn(
      editTurn(),
      "detailed",
      "sess-1",
    );

    expect(mockStartObservation).toHaveBeenCalledWith(
      "summarize-turn-detailed",
      expect.objectContaining({
        model: "test-model",
        metadata: { detail_level: "detailed", session_id: "sess-1" },
      }),
      { asType: "generation" },
    );
    expect(mockObservationUpdate).toHaveBeenCalledWith({
      output: { role: "assistant", content: "Edited a.ts" },
      usageDetails: { input: 10, output: 5 },
    });
    expect(mockObservationEnd).toHaveBeenCalledTimes(1);
  });

  it("marks failed generations", async () => {
    mockQuery.mockImplementation(() => replies({ type: "result", subtype: "error_during_execution" }));
    await new AgentSummarizer({ cwd, traced: true }).summarizeTurn(editTurn(), "normal", "s");

    expect(mockObservationUpdate).toHaveBeenCalledWith({
      output: { role: "assistant", content: "" },
      level: "ERROR",
      statusMessage: "Agent query ended with error_during_execution",
    });
  });

  it("does not trace unless asked", async () => {
    mockQuery.mockImplementation(() => replies(success("ok")));
    await new AgentSummarizer({ cwd }).summarizeTurn(editTurn(), "normal", "s");
    expect(mockStartObservation).not.toHaveBeenCalled();
  });
});

describe("summarizeSession", () => {
  it("summarizes turns in order under one session", async () => {
    const progress: Array<[number, number]> = [];
    const turns = [
      makeTurn({ toolMessages: [makeMessage({ type: "summary", content: "first" })] }),
      makeTurn({ toolMessages: [makeMessage({ type: "summary", content: "second" })] }),
    ];

    const results = await summarizeSession(
      turns,
      new OfflineSummarizer(),
      "normal",
      "sess-9",
      (done, total) => progress.push([done, total]),
    );

    expect(results.map((r) => r.summary)).toEqual(["first", "second"]);
    expect(progress).toEqual([
      [1, 2],
      [2, 2],
    ]);
    expect(mockPropagateAttributes).toHaveBeenCalledWith({ sessionId: "sess-9" }, expect.any(Function));
  });
});

import { mkdirSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { query } from "@anthropic-ai/claude-agent-sdk";
import type { SDKMessage } from "@anthropic-ai/claude-agent-sdk";
import { debug, log } from "./logger.js";
import { getTextContent, truncate } from "./content.js";
import { errorMessage, SummarizerError } from "./errors.js";
import { DEFAULT_MODEL } from "./config.js";
import { compactToolCalls, filterToolsByLevel, stringArg } from "./tools.js";
import { startSummaryGeneration, withSessionTrace } from "./tracer.js";
import type { SummaryCache } from "./cache.js";
import type {
  ConversationTurn,
  DetailLevel,
  Message,
  SummaryResult,
  TurnSummarizer,
} from "./types.js";

// --- Offline ---

const TODO_INDICATORS = [
  "todowrite",
  "todo",
  "task",
  "working on",
  "implementing",
  "starting",
  "completing",
  "finished",
  "adding",
  "creating",
];

function systemText(msg: Message): string {
  return typeof msg.content === "string" ? msg.content : getTextContent(msg.content);
}

function isTodoActivity(msg: Message): boolean {
  const text = systemText(msg).toLowerCase();
  return text !== "" && TODO_INDICATORS.some((word) => text.includes(word));
}

function describeTodoActivity(msg: Message): string {
  const text = systemText(msg);
  const lower = text.toLowerCase();
  if (lower.includes("todowrite")) return "Updated todo list with current tasks";
  if (lower.includes("completed successfully")) return "Completed task successfully";
  if (lower.includes("running") && lower.includes("tool")) {
    return "Executing tools and commands";
  }
  const cleaned = text.replaceAll("\u001b[1m", "").replaceAll("\u001b[22m", "").trim();
  return cleaned.length > 100 ? `${cleaned.slice(0, 100)}...` : cleaned;
}

function keyArgument(input: Record<string, unknown> | undefined): string {
  if (!input) return "";
  if ("file_path" in input) return stringArg(input, "file_path");
  if ("command" in input) {
    const command = stringArg(input, "command");
    return command.length > 50 ? `${command.slice(0, 50)}...` : command;
  }
  if ("pattern" in input) return `pattern: ${stringArg(input, "pattern")}`;
  const json = JSON.stringify(input);
  return json.length > 50 ? `${json.slice(0, 50)}...` : json;
}

/**
 * Summaries from what the logs already hold: `summary` records and
 * todo-like system messages, falling back to the tools used.
 */
export class OfflineSummarizer implements TurnSummarizer {
  async summarizeTurn(turn: ConversationTurn): Promise<SummaryResult> {
    const summaries = [
      ...turn.assistantMessages,
      ...turn.systemMessages,
      ...turn.toolMessages,
    ]
      .filter((msg) => msg.type === "summary")
      .map((msg) => getTextContent(msg.content));
    const activities = turn.systemMessages.filter(isTodoActivity).map(describeTodoActivity);

    const toolCalls: string[] = [];
    const toolNames: string[] = [];
    for (const msg of turn.assistantMessages) {
      if (!msg.toolName) continue;
      toolCalls.push(`${msg.toolName}: ${keyArgument(msg.toolArgs)}`);
      toolNames.push(msg.toolName);
    }

    const parts = [...summaries];
    if (activities.length > 0) {
      if (parts.length > 0) parts.push("Activities:");
      parts.push(...activities);
    }
    if (parts.length === 0 && toolNames.length > 0) {
      parts.push(`Used tools: ${toolNames.slice(0, 5).join(", ")}`);
    }

    return {
      summary: parts.length > 0 ? parts.join("\n") : "No summary information available in logs.",
      toolCalls,
    };
  }
}

// --- Agent ---

const SYSTEM_PROMPTS: Record<DetailLevel, string> = {
  minimal: [
    "You are summarizing Claude Code assistant actions between user messages.",
    "Focus ONLY on file edits (Edit, MultiEdit, Write) and bash commands (Bash).",
    "Summarize each action in one line, focusing on what was changed or executed.",
    "Ignore all other tool calls and system messages.",
    "Be very concise and specific about file names and key changes.",
    "Output only the summary, no additional formatting.",
  ].join("\n"),
  normal: [
    "You are summarizing Claude Code assistant actions between user messages.",
    "Include file operations (Edit, MultiEdit, Write, Read), bash commands (Bash), and search operations (Grep, Glob, LS).",
    "Summarize the overall flow of actions taken by the assistant.",
    "For tool calls, briefly describe what was done without including full outputs.",
    "Be concise but capture the key activities and their purpose.",
    "Output only the summary, no additional formatting.",
  ].join("\n"),
  detailed: [
    "You are summarizing Claude Code assistant actions between user messages.",
    "Include ALL tool calls and assistant reasoning.",
    "Provide a comprehensive summary of what the assistant did, including:",
    "- All tool calls and their purposes",
    "- Any reasoning or explanations given",
    "- The overall approach taken",
    "- Key decisions made",
    "Be thorough but organized.",
    "Output only the summary, no additional formatting.",
  ].join("\n"),
};

export function systemPromptFor(level: DetailLevel): string {
  return SYSTEM_PROMPTS[level];
}

function assistantText(msg: Message): string {
  if (typeof msg.content === "string") return msg.content;
  const parts: string[] = [];
  for (const block of msg.content) {
    if (block.type === "text") parts.push(block.text);
    else if (block.type === "tool_use") {
      parts.push(`[Tool: ${block.name} with ${JSON.stringify(block.input)}]`);
    }
  }
  return parts.join("\n");
}

/**
 * Text sent for summarization. Depends only on the turn and the detail
 * level, so it doubles as the cache key content.
 */
export function buildSummaryContent(
  turn: ConversationTurn,
  level: DetailLevel,
): string {
  const messages = filterToolsByLevel(
    [...turn.assistantMessages, ...turn.systemMessages],
    level,
  );
  const parts: string[] = [];
  for (const msg of messages) {
    if (msg.type === "assistant") {
      const text = assistantText(msg);
      if (text) parts.push(text);
    } else if (msg.type === "system") {
      const text = systemText(msg);
      if (text) parts.push(`[System: ${text}]`);
    }
  }
  return parts.join("\n\n");
}

export interface AgentSummarizerOptions {
  cache?: SummaryCache | null;
  model?: string;
  /** Record each call as a Langfuse generation. */
  traced?: boolean;
  /** Working directory for the agent; a scratch directory under tmp by default. */
  cwd?: string;
}

interface AgentReply {
  text: string;
  inputTokens: number;
  outputTokens: number;
}

/** Summaries written by a model through one tool-less agent turn. */
export class AgentSummarizer implements TurnSummarizer {
  private readonly cache: SummaryCache | null;
  private readonly model: string;
  private readonly traced: boolean;
  private readonly cwd: string | undefined;

  constructor(options: AgentSummarizerOptions = {}) {
    this.cache = options.cache ?? null;
    this.model = options.model ?? DEFAULT_MODEL;
    this.traced = options.traced ?? false;
    this.cwd = options.cwd;
  }

  async summarizeTurn(
    turn: ConversationTurn,
    detailLevel: DetailLevel,
    sessionId: string,
  ): Promise<SummaryResult> {
    const toolCalls = compactToolCalls(turn.assistantMessages, detailLevel);
    const content = buildSummaryContent(turn, detailLevel);

    if (!content.trim()) {
      return { summary: "No relevant assistant actions found.", toolCalls };
    }

    const cached = this.cache?.get(sessionId, content, detailLevel);
    if (cached) {
      debug(`Summary cache hit for session ${sessionId}`);
      return { ...cached, toolCalls };
    }

    const prompt = `Summarize these Claude Code assistant actions:\n\n${content}`;
    const systemPrompt = systemPromptFor(detailLevel);
    const generation = this.traced
      ? startSummaryGeneration({
          model: this.model,
          systemPrompt,
          prompt,
          detailLevel,
          sessionId,
        })
      : null;

    let result: SummaryResult;
    try {
      const reply = await this.ask(prompt, systemPrompt);
      result = {
        summary: reply.text,
        toolCalls,
        tokensUsed: reply.inputTokens + reply.outputTokens,
      };
      generation?.end({
        summary: reply.text,
        inputTokens: reply.inputTokens,
        outputTokens: reply.outputTokens,
      });
    } catch (e: unknown) {
      const error = errorMessage(e);
      log("ERROR", `Summarization failed for session ${sessionId}: ${truncate(error, 200)}`);
      result = { summary: "", toolCalls, error };
      generation?.end({ summary: "", error });
    }

    this.cache?.store(sessionId, content, detailLevel, result);
    return result;
  }

  private async ask(prompt: string, systemPrompt: string): Promise<AgentReply> {
    const messages: AsyncIterable<SDKMessage> = query({
      prompt,
      options: {
        systemPrompt,
        model: this.model,
        maxTurns: 1,
        allowedTools: [],
        cwd: this.cwd ?? scratchDir(),
      },
    });

    for await (const message of messages) {
      if (message.type !== "result") continue;
      if (message.subtype !== "success") {
        throw new SummarizerError(`Agent query ended with ${message.subtype}`, {
          subtype: message.subtype,
        });
      }
      return {
        text: message.result.trim(),
        inputTokens: message.usage.input_tokens,
        outputTokens: message.usage.output_tokens,
      };
    }
    throw new SummarizerError("Agent query returned no result");
  }
}

/**
 * Summarizes turns one after another under a single session trace.
 * `onProgress` is called after each turn with the count done so far.
 */
export async function summarizeSession(
  turns: readonly ConversationTurn[],
  summarizer: TurnSummarizer,
  detailLevel: DetailLevel,
  sessionId: string,
  onProgress?: (done: number, total: number) => void,
): Promise<SummaryResult[]> {
  return withSessionTrace(sessionId, async () => {
    const results: SummaryResult[] = [];
    for (const turn of turns) {
      results.push(await summarizer.summarizeTurn(turn, detailLevel, sessionId));
      onProgress?.(results.length, turns.length);
    }
    return results;
  });
}

function scratchDir(): string {
  const dir = join(tmpdir(), "session-digest");
  mkdirSync(dir, { recursive: true });
  return dir;
}

import { createHash } from "node:crypto";
import { parseIsoTimestamp } from "./timestamp.js";
import type {
  ContentBlock,
  Message,
  MessageContent,
  RawRecord,
  TextBlock,
  ToolUseBlock,
  ToolResultBlock,
  UsageInfo,
} from "./types.js";

// --- Raw value guards ---

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

// --- Content block type guards ---

function isBlockOfType<T extends ContentBlock>(
  item: ContentBlock,
  type: T["type"],
): item is T {
  return item.type === type;
}

export function isTextBlock(item: ContentBlock): item is TextBlock {
  return isBlockOfType<TextBlock>(item, "text");
}

export function isToolUseBlock(item: ContentBlock): item is ToolUseBlock {
  return isBlockOfType<ToolUseBlock>(item, "tool_use");
}

export function isToolResultBlock(item: ContentBlock): item is ToolResultBlock {
  return isBlockOfType<ToolResultBlock>(item, "tool_result");
}

// --- Raw payload → content union ---

function toBlock(item: unknown): ContentBlock {
  if (!isRecord(item)) {
    return { type: "raw", blockType: typeof item, data: item };
  }

  switch (item.type) {
    case "text":
      return { type: "text", text: typeof item.text === "string" ? item.text : "" };
    case "tool_use":
      return {
        type: "tool_use",
        id: typeof item.id === "string" ? item.id : "",
        name: typeof item.name === "string" ? item.name : "",
        input: isRecord(item.input) ? item.input : {},
      };
    case "tool_result": {
      const isError = item.is_error;
      return {
        type: "tool_result",
        tool_use_id: typeof item.tool_use_id === "string" ? item.tool_use_id : "",
        content: item.content,
        ...(typeof isError === "boolean" && { is_error: isError }),
      };
    }
    default:
      return {
        type: "raw",
        blockType: typeof item.type === "string" ? item.type : "unknown",
        data: item,
      };
  }
}

export function toMessageContent(raw: unknown): MessageContent {
  if (typeof raw === "string") return raw;
  if (Array.isArray(raw)) return raw.map(toBlock);
  if (raw === undefined || raw === null) return "";
  if (isRecord(raw)) return [toBlock(raw)];
  return String(raw);
}

/** An empty usage object counts as no usage at all. */
function toUsage(raw: unknown): UsageInfo | undefined {
  if (!isRecord(raw) || Object.keys(raw).length === 0) return undefined;
  const usage: UsageInfo = {};
  for (const key of [
    "input_tokens",
    "output_tokens",
    "cache_creation_input_tokens",
    "cache_read_input_tokens",
  ] as const) {
    const value = raw[key];
    if (typeof value === "number") usage[key] = value;
  }
  return usage;
}

// --- Record → Message ---

interface RecordFields {
  content: unknown;
  usage?: unknown;
}

function selectFields(type: string, raw: RawRecord): RecordFields {
  const body = isRecord(raw.message) ? raw.message : undefined;
  switch (type) {
    case "user":
      return { content: body?.content ?? raw.content ?? "" };
    case "assistant":
      return { content: body?.content ?? [], usage: body?.usage };
    case "system":
      return { content: raw.content ?? "" };
    case "summary":
      return { content: raw.summary ?? "" };
    default:
      return { content: raw.content ?? raw.message ?? "" };
  }
}

export interface BuildMessageOptions {
  lineNumber: number;
  parsedAt: Date;
}

/**
 * Builds a Message from one decoded JSONL record. Every missing field is
 * defaulted here so consumers never re-check the raw shape.
 */
export function buildMessage(
  raw: RawRecord,
  { lineNumber, parsedAt }: BuildMessageOptions,
): Message {
  const type = typeof raw.type === "string" && raw.type ? raw.type : "unknown";
  const fields = selectFields(type, raw);
  const content = toMessageContent(fields.content);
  const toolUse = findToolUse(content);
  const usage = toUsage(fields.usage);
  const cwd = optionalString(raw.cwd);
  const gitBranch = optionalString(raw.gitBranch);

  return {
    uuid: typeof raw.uuid === "string" && raw.uuid ? raw.uuid : `line_${lineNumber}`,
    parentUuid: typeof raw.parentUuid === "string" ? raw.parentUuid : null,
    type,
    timestamp: typeof raw.timestamp === "string" ? raw.timestamp : "",
    parsedAt,
    content,
    sessionId: typeof raw.sessionId === "string" ? raw.sessionId : "",
    ...(cwd !== undefined && { cwd }),
    ...(gitBranch !== undefined && { gitBranch }),
    ...(toolUse && { toolName: toolUse.name, toolArgs: toolUse.input }),
    ...(usage && { usage }),
    category: null,
  };
}

// --- Message accessors ---

/** Parsed timestamp, or the instant the message was parsed when unusable. */
export function getTimestamp(msg: Message): Date {
  return parseIsoTimestamp(msg.timestamp) ?? msg.parsedAt;
}

export function compareByTimestamp(a: Message, b: Message): number {
  return getTimestamp(a).getTime() - getTimestamp(b).getTime();
}

/** First tool_use block of a list content; later ones are ignored. */
export function findToolUse(content: MessageContent): ToolUseBlock | undefined {
  if (typeof content === "string") return undefined;
  return content.find(isToolUseBlock);
}

export function getToolUses(content: MessageContent): ToolUseBlock[] {
  if (typeof content === "string") return [];
  return content.filter(isToolUseBlock);
}

export function hasToolResult(content: MessageContent): boolean {
  return typeof content !== "string" && content.some(isToolResultBlock);
}

/**
 * Plain text of a message: string content as is, or the `text` blocks of a
 * list joined with `separator`.
 */
export function getTextContent(content: MessageContent, separator = "\n"): string {
  if (typeof content === "string") return content;
  return content
    .filter(isTextBlock)
    .map((block) => block.text)
    .join(separator);
}

export function stripSessionHooks(text: string): string {
  return text
    .replaceAll("<session-start-hook>", "")
    .replaceAll("</session-start-hook>", "")
    .trim();
}

/**
 * User-facing text: hook tags removed, tool results skipped, other
 * non-text blocks shown as their JSON.
 */
export function extractUserContent(content: MessageContent): string {
  if (typeof content === "string") return stripSessionHooks(content);

  const parts: string[] = [];
  for (const block of content) {
    switch (block.type) {
      case "text":
        parts.push(block.text);
        break;
      case "tool_result":
        break;
      case "tool_use":
        parts.push(JSON.stringify(block));
        break;
      case "raw":
        parts.push(JSON.stringify(block.data));
        break;
    }
  }
  return parts.join("\n").trim();
}

export function truncate(text: string, maxLength: number, suffix = "..."): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - suffix.length) + suffix;
}

/** First `count` characters, counted in code points. */
export function prefix(text: string, count: number): string {
  return Array.from(text).slice(0, count).join("");
}

export function charLength(text: string): number {
  return Array.from(text).length;
}

// --- Hashing ---

/** JSON with object keys sorted at every depth. */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(",")}]`;
  }
  if (value instanceof Date) return JSON.stringify(value.toISOString());
  if (isRecord(value)) {
    const entries = Object.keys(value)
      .sort()
      .filter((key) => value[key] !== undefined)
      .map((key) => `${JSON.stringify(key)}:${stableStringify(value[key])}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

export function shortHash(text: string): string {
  return createHash("sha256").update(text).digest("hex").slice(0, 16);
}

export function hashContent(content: MessageContent): string {
  return shortHash(typeof content === "string" ? content : stableStringify(content));
}

import {
  charLength,
  getTextContent,
  getToolUses,
  hasToolResult,
  isTextBlock,
  isToolUseBlock,
  prefix,
} from "./content.js";
import { SESSION_SUMMARY_MIN_LENGTH, SUBAGENT_PREFIX_LENGTH } from "./config.js";
import type { Message, MessageCategory } from "./types.js";

const CONTINUATION_PHRASE = "this session is being continued";

const PLAN_PHRASES = [
  "## plan",
  "# plan",
  "implementation plan",
  "## comprehensive",
  "## step",
  "### step",
];

export interface CategorizeOptions {
  prefixLength?: number;
}

/**
 * Prompt prefixes of every Task tool call made by the assistant. A user
 * message starting with one of them is that subagent's prompt echoed back.
 */
export function collectSubagentPrefixes(
  messages: readonly Message[],
  prefixLength = SUBAGENT_PREFIX_LENGTH,
): Set<string> {
  const prefixes = new Set<string>();
  for (const msg of messages) {
    if (msg.type !== "assistant") continue;
    for (const toolUse of getToolUses(msg.content)) {
      if (toolUse.name.toLowerCase() !== "task") continue;
      const prompt = toolUse.input.prompt;
      if (typeof prompt === "string" && prompt) {
        prefixes.add(prefix(prompt, prefixLength));
      }
    }
  }
  return prefixes;
}

function isSessionSummary(msg: Message): boolean {
  const text = getTextContent(msg.content, "");
  return (
    text.toLowerCase().startsWith(CONTINUATION_PHRASE) &&
    charLength(text) > SESSION_SUMMARY_MIN_LENGTH
  );
}

function isSystemNoise(content: string): boolean {
  return (
    content.startsWith("<command-") ||
    content.startsWith("<local-command-") ||
    content.includes("command-message")
  );
}

function isPlan(msg: Message): boolean {
  if (typeof msg.content === "string") return false;
  return msg.content.some((block) => {
    if (isTextBlock(block)) {
      const text = block.text.toLowerCase();
      return PLAN_PHRASES.some((phrase) => text.includes(phrase));
    }
    return isToolUseBlock(block) && block.name === "ExitPlanMode";
  });
}

function categoryByType(type: string): MessageCategory {
  switch (type) {
    case "user":
      return "user";
    case "assistant":
      return "assistant";
    case "system":
      return "system";
    case "summary":
      return "session_summary";
    default:
      return "other";
  }
}

/**
 * Rules are checked in order and the first match wins. Tool responses must
 * come first: the later user checks assume plain-string content.
 */
export function determineCategory(
  msg: Message,
  subagentPrefixes: ReadonlySet<string>,
  prefixLength = SUBAGENT_PREFIX_LENGTH,
): MessageCategory {
  if (msg.type === "user") {
    if (hasToolResult(msg.content)) return "tool_response";
    if (isSessionSummary(msg)) return "session_summary";
    if (typeof msg.content === "string") {
      if (isSystemNoise(msg.content)) return "system_noise";
      if (subagentPrefixes.has(prefix(msg.content, prefixLength))) {
        return "subagent";
      }
    }
  }

  if (msg.type === "assistant" && isPlan(msg)) return "plan";

  return categoryByType(msg.type);
}

export function categorizeMessages(
  messages: readonly Message[],
  { prefixLength = SUBAGENT_PREFIX_LENGTH }: CategorizeOptions = {},
): Message[] {
  const prefixes = collectSubagentPrefixes(messages, prefixLength);
  return messages.map((msg) => ({
    ...msg,
    category: determineCategory(msg, prefixes, prefixLength),
  }));
}

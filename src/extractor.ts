import { charLength, stripSessionHooks } from "./content.js";
import { EXCLUDED_CATEGORIES } from "./config.js";
import { stringArg } from "./tools.js";
import type {
  ConversationTurn,
  ExtractedMessage,
  Message,
  MessageCategory,
  MessageContent,
  ToolUseBlock,
} from "./types.js";

export const DEFAULT_EXTRACT_CATEGORIES: readonly MessageCategory[] = [
  "user",
  "subagent",
  "plan",
  "assistant",
];

/** Texts this short or shorter are dropped. */
const MIN_CONTENT_LENGTH = 5;

const GENERIC_TOOL_KEYS = ["file_path", "command", "pattern", "query", "description"];

export interface ExtractOptions {
  /** Show tool arguments in full instead of previews. */
  noTruncate?: boolean;
}

function preview(text: string, max: number, noTruncate: boolean): string {
  if (noTruncate || text.length <= max) return text;
  return `${text.slice(0, max)}...`;
}

function describeToolUse(block: ToolUseBlock, noTruncate: boolean): string[] {
  const input = block.input;
  const arg = (key: string) => stringArg(input, key);

  switch (block.name) {
    case "ExitPlanMode":
      return arg("plan") ? [arg("plan")] : [];
    case "Task": {
      const parts: string[] = [];
      if (arg("description")) parts.push(`[Task: ${arg("description")}]`);
      if (arg("subagent_type")) parts.push(`Using ${arg("subagent_type")} agent`);
      if (arg("prompt")) parts.push(`Prompt: ${arg("prompt")}`);
      return parts;
    }
    case "Write": {
      const parts = [`Writing to ${arg("file_path")}`];
      const content = arg("content");
      if (content) {
        parts.push(
          noTruncate
            ? `Content: ${content}`
            : `Content preview: ${preview(content, 100, false)}`,
        );
      }
      return parts;
    }
    case "Edit": {
      const parts = [`Editing ${arg("file_path")}`];
      if (arg("old_string")) {
        parts.push(`Replacing: ${preview(arg("old_string"), 50, noTruncate)}`);
      }
      if (arg("new_string")) {
        parts.push(`With: ${preview(arg("new_string"), 50, noTruncate)}`);
      }
      return parts;
    }
    case "Read":
      return [`Reading ${arg("file_path")}`];
    case "Bash":
      if (arg("description")) return [`Running: ${arg("description")}`];
      return arg("command") ? [`$ ${preview(arg("command"), 100, noTruncate)}`] : [];
    case "Grep":
      return [`Searching for '${arg("pattern")}' in ${arg("path") || "."}`];
    case "Glob":
      return [`Finding files matching '${arg("pattern")}' in ${arg("path") || "."}`];
    default: {
      const parts = [`[${block.name}]`];
      for (const key of GENERIC_TOOL_KEYS) {
        if (!(key in input)) continue;
        const value = input[key];
        const text = typeof value === "string" ? value : JSON.stringify(value);
        parts.push(`  ${key}: ${preview(text, 100, noTruncate)}`);
      }
      return parts;
    }
  }
}

/** Display text of a message's content. */
export function renderContent(
  content: MessageContent,
  { noTruncate = false }: ExtractOptions = {},
): string {
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
        parts.push(...describeToolUse(block, noTruncate));
        break;
      case "raw":
        parts.push(`[${block.blockType}]`);
        break;
    }
  }
  return parts.join("\n").trim();
}

function isWanted(
  msg: Message,
  categories: ReadonlySet<MessageCategory>,
): msg is Message & { category: MessageCategory } {
  return (
    msg.category !== null &&
    categories.has(msg.category) &&
    !EXCLUDED_CATEGORIES.has(msg.category)
  );
}

/**
 * Messages of the requested categories in turn order, numbered from 1.
 * Only the user message of each turn carries working directory and branch.
 */
export function extractMessages(
  turns: readonly ConversationTurn[],
  categories: readonly MessageCategory[] = DEFAULT_EXTRACT_CATEGORIES,
  options: ExtractOptions = {},
): ExtractedMessage[] {
  const wanted = new Set(categories);
  const extracted: ExtractedMessage[] = [];

  const add = (msg: Message, withContext: boolean) => {
    if (!isWanted(msg, wanted)) return;
    const content = renderContent(msg.content, options);
    if (charLength(content.trim()) <= MIN_CONTENT_LENGTH) return;

    extracted.push({
      number: extracted.length + 1,
      category: msg.category,
      timestamp: msg.timestamp,
      content,
      uuid: msg.uuid,
      ...(withContext && msg.cwd ? { cwd: msg.cwd } : {}),
      ...(withContext && msg.gitBranch ? { gitBranch: msg.gitBranch } : {}),
    });
  };

  for (const turn of turns) {
    add(turn.userMessage, true);
    for (const assistant of turn.assistantMessages) add(assistant, false);
  }
  return extracted;
}

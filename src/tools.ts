import { basename } from "node:path";
import { MINIMAL_TOOLS, NORMAL_TOOLS, TOOL_COMMAND_TRUNCATION } from "./config.js";
import type { DetailLevel, Message } from "./types.js";

const FILE_TOOLS = ["Read", "Edit", "MultiEdit", "Write"];

export function stringArg(
  input: Record<string, unknown> | undefined,
  key: string,
): string {
  const value = input?.[key];
  return typeof value === "string" ? value : "";
}

function fileName(path: string): string {
  return path ? basename(path) : "";
}

/** One-line description of what an Edit call changed. */
export function summarizeEdit(oldString: string, newString: string): string {
  if (!oldString && newString) {
    const lines = newString.trim().split("\n");
    if (lines.length === 1) {
      const preview = lines[0].slice(0, 40);
      return lines[0].length > 40 ? `added: ${preview}...` : `added: ${preview}`;
    }
    return `added ${lines.length} lines`;
  }

  if (oldString && !newString) {
    const lines = oldString.trim().split("\n");
    return lines.length === 1 ? "deleted line" : `deleted ${lines.length} lines`;
  }

  if (oldString && newString) {
    const oldLines = oldString.split("\n");
    const newLines = newString.split("\n");

    if (oldLines.length === 1 && newLines.length === 1) {
      const before = oldString.trim();
      const after = newString.trim();
      if (before.includes("function ") && after.includes("function ")) {
        return "renamed function";
      }
      if (before.includes("class ") && after.includes("class ")) {
        return "renamed class";
      }
      if (before.includes("import ") && after.includes("import ")) {
        return "changed import";
      }
      return "changed line";
    }

    const diff = newLines.length - oldLines.length;
    if (diff > 0) return `expanded (+${diff} lines)`;
    if (diff < 0) return `reduced (${diff} lines)`;
    return `modified ${oldLines.length} lines`;
  }

  return "modified";
}

export function summarizeToolArgs(
  toolName: string,
  input: Record<string, unknown> = {},
): string {
  const file = fileName(stringArg(input, "file_path"));
  switch (toolName) {
    case "Edit":
      return `${file} (${summarizeEdit(stringArg(input, "old_string"), stringArg(input, "new_string"))})`;
    case "MultiEdit": {
      const edits = Array.isArray(input.edits) ? input.edits.length : 0;
      return `${file} (${edits} edits)`;
    }
    case "Write": {
      const content = stringArg(input, "content");
      return `${file} (${content ? content.split("\n").length : 0} lines)`;
    }
    case "Read":
      return file;
    case "Bash":
      return stringArg(input, "description") || stringArg(input, "command").slice(0, 80);
    case "Grep":
    case "Glob":
      return stringArg(input, "pattern");
    case "Task":
      return stringArg(input, "description");
    default:
      return "";
  }
}

function bashLine(input: Record<string, unknown>): string {
  const command = stringArg(input, "command").slice(0, TOOL_COMMAND_TRUNCATION);
  return `Bash: ${stringArg(input, "description") || command}`;
}

/**
 * Tool calls of a turn as short lines. `detailed` lists every call; the
 * other levels fold file operations into one line per file.
 */
export function compactToolCalls(
  messages: readonly Message[],
  level: DetailLevel = "normal",
): string[] {
  if (level === "detailed") {
    const calls: string[] = [];
    for (const msg of messages) {
      if (!msg.toolName) continue;
      const args = summarizeToolArgs(msg.toolName, msg.toolArgs);
      calls.push(args ? `${msg.toolName}: ${args}` : msg.toolName);
    }
    return calls;
  }

  const fileOps = new Map<string, Set<string>>();
  const others: string[] = [];
  const addOnce = (line: string) => {
    if (!others.includes(line)) others.push(line);
  };

  for (const msg of messages) {
    const name = msg.toolName;
    if (!name) continue;
    const input = msg.toolArgs ?? {};

    if (FILE_TOOLS.includes(name)) {
      const path = stringArg(input, "file_path");
      if (!path) continue;
      const ops = fileOps.get(path) ?? new Set<string>();
      ops.add(name);
      fileOps.set(path, ops);
    } else if (name === "Bash") {
      if (level === "minimal") others.push(bashLine(input));
      else addOnce(bashLine(input));
    } else if (level === "normal") {
      if (name === "Grep" || name === "Glob") {
        addOnce(`${name}: ${stringArg(input, "pattern")}`);
      } else if (name === "Task") {
        others.push(`Task: ${stringArg(input, "description")}`);
      }
    }
  }

  const lines: string[] = [];
  for (const [path, ops] of fileOps) {
    const ordered = FILE_TOOLS.filter((tool) => ops.has(tool));
    lines.push(`${ordered.join(" + ")}: ${basename(path)}`);
  }
  return [...lines, ...others];
}

/** Assistant tool calls kept at a detail level; messages without a tool pass through. */
export function filterToolsByLevel(
  messages: readonly Message[],
  level: DetailLevel,
): Message[] {
  if (level === "detailed") return [...messages];
  const allowed = level === "minimal" ? MINIMAL_TOOLS : NORMAL_TOOLS;
  return messages.filter(
    (msg) =>
      msg.type !== "assistant" || !msg.toolName || allowed.includes(msg.toolName),
  );
}

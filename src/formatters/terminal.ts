import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import { extractUserContent, truncate } from "../content.js";
import {
  CATEGORY_LABELS,
  CONTENT_TRUNCATION_TERMINAL,
  DEFAULT_SEPARATOR,
} from "../config.js";
import {
  formatTimestampDate,
  formatTimestampShort,
  parseIsoTimestamp,
} from "../timestamp.js";
import { displaySessionId, formatFileSize, zipSummaries } from "./base.js";
import type { FormatOptions, Formatter } from "./base.js";
import type {
  ConversationTurn,
  DigestMetadata,
  ExtractedMessage,
  MessageCategory,
  SessionInfo,
  SummaryResult,
} from "../types.js";

function categoryColor(c: ChalkInstance, category: MessageCategory): ChalkInstance {
  switch (category) {
    case "user":
      return c.blue;
    case "assistant":
      return c.green;
    case "plan":
      return c.magenta;
    case "subagent":
      return c.cyan;
    case "session_summary":
      return c.yellow;
    default:
      return c.gray;
  }
}

/** Colored output for an interactive terminal. */
export class TerminalFormatter implements Formatter {
  constructor(private readonly c: ChalkInstance = chalk) {}

  formatSessionSummary(
    turns: readonly ConversationTurn[],
    summaries: readonly SummaryResult[],
    metadata: DigestMetadata,
    { includeMetadata = false, separator = DEFAULT_SEPARATOR }: FormatOptions = {},
  ): string {
    const { c } = this;
    const lines = [c.bold(`Session ${metadata.sessionId}`)];
    if (includeMetadata) {
      lines.push(c.dim(`${metadata.messageCount} messages, ${turns.length} turns`));
    }
    lines.push("");

    zipSummaries(turns, summaries).forEach(([turn, summary], i) => {
      if (i > 0) lines.push(c.dim(separator), "");

      let heading = c.bold.blue(`👤 Turn ${i + 1}`);
      const time = parseIsoTimestamp(turn.userMessage.timestamp);
      if (includeMetadata && time) heading += c.dim(` ${formatTimestampShort(time)}`);
      if (includeMetadata && turn.durationSeconds) {
        heading += c.dim(` (${turn.durationSeconds.toFixed(1)}s)`);
      }
      lines.push(heading);
      lines.push(
        truncate(extractUserContent(turn.userMessage.content), CONTENT_TRUNCATION_TERMINAL) ||
          c.dim("[Empty message]"),
        "",
      );

      if (summary.error) {
        lines.push(c.red(`✖ ${summary.error}`));
      } else if (summary.summary) {
        const tokens = includeMetadata && summary.tokensUsed ? c.dim(` ${summary.tokensUsed} tokens`) : "";
        lines.push(c.bold.green("🤖 Assistant") + tokens, summary.summary);
      }
      for (const call of summary.toolCalls) lines.push(c.yellow(`  • ${call}`));
      lines.push("");
    });

    return lines.join("\n");
  }

  formatMessages(
    messages: readonly ExtractedMessage[],
    metadata: DigestMetadata,
    { includeMetadata = false, separator = DEFAULT_SEPARATOR }: FormatOptions = {},
  ): string {
    const { c } = this;
    const lines = [c.bold(`Messages from session ${metadata.sessionId}`), ""];
    if (messages.length === 0) {
      lines.push(c.dim("No messages found."));
      return lines.join("\n");
    }

    messages.forEach((message, i) => {
      if (i > 0) lines.push(c.dim(separator));
      const label = CATEGORY_LABELS[message.category] ?? message.category.toUpperCase();
      let heading = categoryColor(c, message.category).bold(`[${label}]`);
      const time = parseIsoTimestamp(message.timestamp);
      if (includeMetadata && time) heading += c.dim(` ${formatTimestampShort(time)}`);
      lines.push(heading, truncate(message.content, CONTENT_TRUNCATION_TERMINAL), "");
    });
    return lines.join("\n");
  }

  formatSessionList(
    sessions: readonly SessionInfo[],
    { verbose = false }: FormatOptions = {},
  ): string {
    const { c } = this;
    const lines = [c.bold("Available Claude Code Sessions"), ""];
    if (sessions.length === 0) {
      lines.push(c.dim("No sessions found."));
      return lines.join("\n");
    }

    for (const session of sessions) {
      const modified = formatTimestampDate(parseIsoTimestamp(session.lastModified)) || "Unknown";
      lines.push(
        `${c.cyan(displaySessionId(session.sessionId, verbose))}  ${c.dim(modified)}  ${c.dim(`${session.lineCount} lines, ${formatFileSize(session.fileSize)}`)}`,
      );
      if (session.description) lines.push(`  ${truncate(session.description, 100)}`);
    }
    lines.push("");
    return lines.join("\n");
  }
}

import { extractUserContent } from "../content.js";
import { CATEGORY_LABELS, DEFAULT_SEPARATOR } from "../config.js";
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
  SessionInfo,
  SummaryResult,
} from "../types.js";

/** Uncolored text separated by a rule line, for pipes and files. */
export class PlainFormatter implements Formatter {
  formatSessionSummary(
    turns: readonly ConversationTurn[],
    summaries: readonly SummaryResult[],
    metadata: DigestMetadata,
    { includeMetadata = false, separator = DEFAULT_SEPARATOR }: FormatOptions = {},
  ): string {
    const lines: string[] = [];
    if (includeMetadata) {
      lines.push(`Session: ${metadata.sessionId}`, `Messages: ${metadata.messageCount}`, separator);
    }

    zipSummaries(turns, summaries).forEach(([turn, summary], i) => {
      if (i > 0) lines.push("", separator, "");

      const time = parseIsoTimestamp(turn.userMessage.timestamp);
      if (includeMetadata && time) lines.push(`[${formatTimestampShort(time)}]`);
      lines.push(extractUserContent(turn.userMessage.content) || "[Empty user message]");

      if (summary.summary || summary.error) {
        lines.push("", "Assistant:");
        if (includeMetadata && summary.tokensUsed) lines.push(`[${summary.tokensUsed} tokens]`);
        lines.push(summary.error ? `Error: ${summary.error}` : summary.summary);
      }
      if (summary.toolCalls.length > 0) {
        lines.push("", "Tools used:", ...summary.toolCalls.map((call) => `• ${call}`));
      }
    });

    return lines.join("\n");
  }

  formatMessages(
    messages: readonly ExtractedMessage[],
    metadata: DigestMetadata,
    { includeMetadata = false, separator = DEFAULT_SEPARATOR }: FormatOptions = {},
  ): string {
    const lines = [`Messages from Session ${metadata.sessionId}`, separator, ""];
    if (messages.length === 0) {
      lines.push("No messages found.");
      return lines.join("\n");
    }

    messages.forEach((message, i) => {
      const time = parseIsoTimestamp(message.timestamp);
      if (includeMetadata && time) lines.push(`[${formatTimestampShort(time)}]`);
      const label = CATEGORY_LABELS[message.category] ?? message.category.toUpperCase();
      lines.push(`[${label}] ${message.content}`);
      if (i < messages.length - 1) lines.push("", separator, "");
    });
    return lines.join("\n");
  }

  formatSessionList(
    sessions: readonly SessionInfo[],
    { verbose = false, separator = DEFAULT_SEPARATOR }: FormatOptions = {},
  ): string {
    const lines = ["Available Claude Code Sessions", separator, ""];
    if (sessions.length === 0) {
      lines.push("No sessions found.");
      return lines.join("\n");
    }

    for (const session of sessions) {
      const modified = formatTimestampDate(parseIsoTimestamp(session.lastModified)) || "Unknown";
      const line = `${displaySessionId(session.sessionId, verbose)} | ${session.lineCount} lines | ${formatFileSize(session.fileSize)} | ${modified}`;
      lines.push(session.description ? `${line} | ${session.description.slice(0, 80)}` : line);
    }
    lines.push("");
    return lines.join("\n");
  }
}

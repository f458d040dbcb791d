import { extractUserContent } from "../content.js";
import { CATEGORY_LABELS } from "../config.js";
import {
  formatTime,
  formatTimestampDate,
  formatTimestampFull,
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

/** Sessions with more turns than this get a table of contents. */
const TOC_THRESHOLD = 5;

function turnHeading(num: number, turn: ConversationTurn, includeMetadata: boolean): string {
  const heading = `## Turn ${num}`;
  if (!includeMetadata) return heading;
  const parts: string[] = [];
  if (turn.durationSeconds) parts.push(`${turn.durationSeconds.toFixed(1)}s`);
  if (turn.totalTokens) parts.push(`${turn.totalTokens} tokens`);
  return parts.length > 0 ? `${heading} _(${parts.join(", ")})_` : heading;
}

function userSection(turn: ConversationTurn, includeMetadata: boolean): string[] {
  let heading = "### 👤 User";
  const time = parseIsoTimestamp(turn.userMessage.timestamp);
  if (includeMetadata && time) heading += ` _${formatTime(time)}_`;

  const content = extractUserContent(turn.userMessage.content) || "_[Empty message]_";
  return [heading, "", ...content.split("\n").map((line) => `> ${line}`), ""];
}

function assistantSection(summary: SummaryResult): string[] {
  const heading = summary.tokensUsed
    ? `### 🤖 Assistant _${summary.tokensUsed} tokens_`
    : "### 🤖 Assistant";
  const lines = [heading, ""];

  if (summary.error) {
    lines.push("**❌ Error generating summary:**", "", "```", summary.error, "```");
  } else {
    lines.push(summary.summary || "_[No summary available]_");
    if (summary.toolCalls.length > 0) {
      lines.push("", "**🔧 Tools used:**", "");
      lines.push(...summary.toolCalls.map((call) => `- \`${call}\``));
    }
  }
  lines.push("");
  return lines;
}

function tableOfContents(turns: readonly ConversationTurn[]): string[] {
  const lines = ["## Table of Contents", ""];
  turns.forEach((turn, i) => {
    const content = extractUserContent(turn.userMessage.content);
    let firstLine = content.split("\n")[0].trim().slice(0, 80);
    if (firstLine.length < content.length) firstLine += "...";
    lines.push(`${i + 1}. [Turn ${i + 1}: ${firstLine}](#turn-${i + 1})`);
  });
  lines.push("", "---", "");
  return lines;
}

export class MarkdownFormatter implements Formatter {
  formatSessionSummary(
    turns: readonly ConversationTurn[],
    summaries: readonly SummaryResult[],
    metadata: DigestMetadata,
    { includeMetadata = false, now = new Date() }: FormatOptions = {},
  ): string {
    const lines = ["# Claude Code Session Summary", "", `**Session ID:** \`${metadata.sessionId}\``];
    if (includeMetadata) {
      lines.push(`**Messages:** ${metadata.messageCount}`);
      const started = parseIsoTimestamp(metadata.startTime);
      if (started) lines.push(`**Started:** ${formatTimestampFull(started)}`);
    }
    lines.push("", "---", "");

    if (turns.length > TOC_THRESHOLD) lines.push(...tableOfContents(turns));

    zipSummaries(turns, summaries).forEach(([turn, summary], i) => {
      lines.push(`<a id="turn-${i + 1}"></a>`, turnHeading(i + 1, turn, includeMetadata), "");
      lines.push(...userSection(turn, includeMetadata), ...assistantSection(summary), "");
    });

    if (includeMetadata) {
      lines.push("---", "", "## Session Metadata", "");
      lines.push(`- **Session ID:** \`${metadata.sessionId}\``);
      lines.push(`- **Total Messages:** ${metadata.messageCount}`);
      if (metadata.sessionCount > 1) lines.push(`- **Sessions:** ${metadata.sessionCount}`);
      if (metadata.startTime) lines.push(`- **Start Time:** ${metadata.startTime}`);
      lines.push("", `_Generated on ${formatTimestampFull(now)}_`, "");
    }
    return lines.join("\n");
  }

  formatMessages(
    messages: readonly ExtractedMessage[],
    metadata: DigestMetadata,
    { includeMetadata = false }: FormatOptions = {},
  ): string {
    const lines = ["# Session Messages", "", `**Session ID:** \`${metadata.sessionId}\``, ""];
    if (messages.length === 0) {
      lines.push("_No messages found._");
      return lines.join("\n");
    }

    for (const message of messages) {
      let heading = `## ${message.number}. ${CATEGORY_LABELS[message.category] ?? message.category.toUpperCase()}`;
      const time = parseIsoTimestamp(message.timestamp);
      if (includeMetadata && time) heading += ` _${formatTimestampFull(time)}_`;
      lines.push(heading, "");
      if (includeMetadata && message.gitBranch) {
        lines.push(`_Branch: \`${message.gitBranch}\`_`, "");
      }
      lines.push(message.content, "");
    }
    return lines.join("\n");
  }

  formatSessionList(
    sessions: readonly SessionInfo[],
    { verbose = false }: FormatOptions = {},
  ): string {
    const lines = ["# Available Claude Code Sessions", ""];
    if (sessions.length === 0) {
      lines.push("_No sessions found._");
      return lines.join("\n");
    }

    lines.push("| Session ID | Lines | Size | Last Modified | Description |");
    lines.push("|------------|-------|------|---------------|-------------|");
    for (const session of sessions) {
      const modified = formatTimestampDate(parseIsoTimestamp(session.lastModified)) || "Unknown";
      const description = session.description.replaceAll("|", "\\|").slice(0, 60);
      lines.push(
        `| \`${displaySessionId(session.sessionId, verbose)}\` | ${session.lineCount} | ${formatFileSize(session.fileSize)} | ${modified} | ${description} |`,
      );
    }
    lines.push("");
    return lines.join("\n");
  }
}

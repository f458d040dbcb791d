import { extractUserContent } from "../content.js";
import { zipSummaries } from "./base.js";
import type { FormatOptions, Formatter } from "./base.js";
import type {
  ConversationTurn,
  DigestMetadata,
  ExtractedMessage,
  SessionInfo,
  SummaryResult,
} from "../types.js";

type JsonRecord = Record<string, unknown>;

function toLines(records: JsonRecord[]): string {
  return records.map((record) => JSON.stringify(record)).join("\n");
}

function turnRecord(
  num: number,
  turn: ConversationTurn,
  summary: SummaryResult,
  includeMetadata: boolean,
): JsonRecord {
  const user = turn.userMessage;
  return {
    type: "conversation_turn",
    turn_number: num,
    user_message: {
      uuid: user.uuid,
      content: extractUserContent(user.content),
      timestamp: user.timestamp,
      ...(includeMetadata && user.cwd ? { cwd: user.cwd } : {}),
      ...(includeMetadata && user.gitBranch ? { git_branch: user.gitBranch } : {}),
    },
    assistant_summary: {
      summary: summary.summary,
      tool_calls: summary.toolCalls,
      ...(summary.error ? { error: summary.error } : {}),
      ...(summary.tokensUsed !== undefined ? { tokens_used: summary.tokensUsed } : {}),
    },
    ...(includeMetadata
      ? {
          ...(turn.durationSeconds !== null ? { duration_seconds: turn.durationSeconds } : {}),
          ...(turn.totalTokens !== null ? { total_tokens: turn.totalTokens } : {}),
          assistant_message_count: turn.assistantMessages.length,
          system_message_count: turn.systemMessages.length,
          tool_message_count: turn.toolMessages.length,
        }
      : {}),
  };
}

/** One JSON object per line: a header record, then one record per item. */
export class JsonlFormatter implements Formatter {
  formatSessionSummary(
    turns: readonly ConversationTurn[],
    summaries: readonly SummaryResult[],
    metadata: DigestMetadata,
    { includeMetadata = false, now = new Date() }: FormatOptions = {},
  ): string {
    const header: JsonRecord = {
      type: "session_header",
      session_id: metadata.sessionId,
      message_count: metadata.messageCount,
      turn_count: turns.length,
      timestamp: now.toISOString(),
      ...(includeMetadata
        ? { session_count: metadata.sessionCount, start_time: metadata.startTime ?? null }
        : {}),
    };
    const records = zipSummaries(turns, summaries).map(([turn, summary], i) =>
      turnRecord(i + 1, turn, summary, includeMetadata),
    );
    return toLines([header, ...records]);
  }

  formatMessages(
    messages: readonly ExtractedMessage[],
    metadata: DigestMetadata,
    { includeMetadata = false, now = new Date() }: FormatOptions = {},
  ): string {
    const header: JsonRecord = {
      type: "categorized_messages_session",
      session_id: metadata.sessionId,
      message_count: messages.length,
      timestamp: now.toISOString(),
    };
    const records = messages.map(
      (message): JsonRecord => ({
        type: "categorized_message",
        number: message.number,
        category: message.category,
        content: message.content,
        uuid: message.uuid,
        ...(includeMetadata && message.timestamp ? { timestamp: message.timestamp } : {}),
        ...(includeMetadata && message.cwd ? { cwd: message.cwd } : {}),
        ...(includeMetadata && message.gitBranch ? { git_branch: message.gitBranch } : {}),
      }),
    );
    return toLines([header, ...records]);
  }

  formatSessionList(
    sessions: readonly SessionInfo[],
    { now = new Date() }: FormatOptions = {},
  ): string {
    const header: JsonRecord = {
      type: "session_list",
      count: sessions.length,
      timestamp: now.toISOString(),
    };
    const records = sessions.map(
      (session): JsonRecord => ({
        type: "session_info",
        session_id: session.sessionId,
        line_count: session.lineCount,
        file_size: session.fileSize,
        ...(session.startTime ? { start_time: session.startTime } : {}),
        last_modified: session.lastModified,
        description: session.description,
      }),
    );
    return toLines([header, ...records]);
  }
}

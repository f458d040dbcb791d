import type {
  ConversationTurn,
  DigestMetadata,
  ExtractedMessage,
  SessionInfo,
  SummaryResult,
} from "../types.js";

export interface FormatOptions {
  /** Add timestamps, durations and token counts. */
  includeMetadata?: boolean;
  /** Show full session ids in lists. */
  verbose?: boolean;
  separator?: string;
  /** Clock for "generated at" stamps. */
  now?: Date;
}

export interface Formatter {
  formatSessionSummary(
    turns: readonly ConversationTurn[],
    summaries: readonly SummaryResult[],
    metadata: DigestMetadata,
    options?: FormatOptions,
  ): string;
  formatMessages(
    messages: readonly ExtractedMessage[],
    metadata: DigestMetadata,
    options?: FormatOptions,
  ): string;
  formatSessionList(
    sessions: readonly SessionInfo[],
    options?: FormatOptions,
  ): string;
}

export function formatFileSize(bytes: number): string {
  if (bytes > 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
  if (bytes > 1024) return `${Math.round(bytes / 1024)}KB`;
  return `${bytes}B`;
}

export function displaySessionId(sessionId: string, verbose = false): string {
  if (verbose || sessionId.length <= 15) return sessionId;
  return `${sessionId.slice(0, 15)}...`;
}

/** Pairs turns with their summaries; a missing summary reads as empty. */
export function zipSummaries(
  turns: readonly ConversationTurn[],
  summaries: readonly SummaryResult[],
): Array<[ConversationTurn, SummaryResult]> {
  return turns.map((turn, i) => [turn, summaries[i] ?? { summary: "", toolCalls: [] }]);
}

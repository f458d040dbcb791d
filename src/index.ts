export type * from "./types.js";
export { parseLine, parseTranscript, parseSessionFile } from "./filesystem.js";
export type { ParsedLine, ParseOptions, TranscriptParseResult } from "./filesystem.js";
export {
  describeSearch,
  findPreviousSession,
  findSessionById,
  findSessionFiles,
  listSessions,
  projectDirName,
  readSessionInfo,
} from "./filesystem.js";
export { deduplicateMessages } from "./dedupe.js";
export { categorizeMessages, collectSubagentPrefixes, determineCategory } from "./categorizer.js";
export {
  buildConversationTurns,
  calculateTurnDuration,
  calculateTurnTokens,
  groupTurns,
} from "./parser.js";
export { processSessionFiles } from "./processor.js";
export type { FileFailure, ProcessOptions, ProcessResult } from "./processor.js";
export { extractMessages, renderContent } from "./extractor.js";
export { compactToolCalls, summarizeEdit, summarizeToolArgs } from "./tools.js";
export { SummaryCache } from "./cache.js";
export {
  AgentSummarizer,
  OfflineSummarizer,
  buildSummaryContent,
  summarizeSession,
} from "./summarizer.js";
export { startTracing } from "./tracer.js";
export { createFormatter } from "./formatters/index.js";
export type { FormatOptions, Formatter, OutputFormat } from "./formatters/index.js";
export { runDigest } from "./digest.js";
export type { DigestOptions } from "./digest.js";
export {
  ConfigurationError,
  DigestError,
  SessionNotFoundError,
  SummarizerError,
} from "./errors.js";

// --- External data boundary type (raw JSONL shape) ---

export interface UsageInfo {
  input_tokens?: number;
  output_tokens?: number;
  cache_read_input_tokens?: number;
  cache_creation_input_tokens?: number;
}

export interface RawRecord {
  type?: unknown;
  uuid?: unknown;
  parentUuid?: unknown;
  timestamp?: unknown;
  sessionId?: unknown;
  cwd?: unknown;
  gitBranch?: unknown;
  content?: unknown;
  summary?: unknown;
  message?: unknown;
}

// --- Content block types (discriminated union on `type`) ---

export interface TextBlock {
  type: "text";
  text: string;
}

export interface ToolUseBlock {
  type: "tool_use";
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: "tool_result";
  tool_use_id: string;
  content: unknown;
  is_error?: boolean;
}

/** Any block we do not model field by field (thinking, image, ...). */
export interface RawBlock {
  type: "raw";
  blockType: string;
  data: unknown;
}

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock | RawBlock;

export type MessageContent = string | ContentBlock[];

// --- Parsed messages ---

export type MessageType = "user" | "assistant" | "system" | "summary";

export type MessageCategory =
  | "user"
  | "assistant"
  | "system"
  | "plan"
  | "subagent"
  | "tool_response"
  | "session_summary"
  | "system_noise"
  | "other";

export interface Message {
  readonly uuid: string;
  readonly parentUuid: string | null;
  readonly type: MessageType | (string & {});
  /** Raw ISO-8601 string as found in the log; may be empty or malformed. */
  readonly timestamp: string;
  /** Instant the line was parsed; stands in for an unusable `timestamp`. */
  readonly parsedAt: Date;
  readonly content: MessageContent;
  readonly sessionId: string;
  readonly cwd?: string;
  readonly gitBranch?: string;
  readonly toolName?: string;
  readonly toolArgs?: Record<string, unknown>;
  readonly usage?: UsageInfo;
  readonly category: MessageCategory | null;
}

export interface ConversationTurn {
  readonly userMessage: Message;
  readonly assistantMessages: readonly Message[];
  readonly systemMessages: readonly Message[];
  readonly toolMessages: readonly Message[];
  readonly durationSeconds: number | null;
  readonly totalTokens: number | null;
}

export interface GroupTurnsResult {
  turns: ConversationTurn[];
  /** User-type messages categorized as noise, tool responses or summaries. */
  absorbed: Message[];
  /** Messages seen before the first turn-starting user message. */
  preamble: Message[];
}

// --- Summaries ---

export type DetailLevel = "minimal" | "normal" | "detailed";

export interface SummaryResult {
  summary: string;
  toolCalls: string[];
  error?: string;
  tokensUsed?: number;
}

export interface TurnSummarizer {
  summarizeTurn(
    turn: ConversationTurn,
    detailLevel: DetailLevel,
    sessionId: string,
  ): Promise<SummaryResult>;
}

// --- Extraction / discovery ---

export interface ExtractedMessage {
  number: number;
  category: MessageCategory;
  timestamp: string;
  content: string;
  uuid: string;
  cwd?: string;
  gitBranch?: string;
}

export interface SessionInfo {
  sessionId: string;
  filePath: string;
  lineCount: number;
  startTime?: string;
  lastModified: string;
  fileSize: number;
  description: string;
  hasContent: boolean;
}

export interface DigestMetadata {
  sessionId: string;
  messageCount: number;
  sessionCount: number;
  startTime?: string;
}

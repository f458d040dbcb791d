import { basename } from "node:path";
import { debug, log } from "./logger.js";
import {
  describeSearch,
  findPreviousSession,
  findSessionById,
  listSessions,
} from "./filesystem.js";
import { processSessionFiles } from "./processor.js";
import { extractMessages } from "./extractor.js";
import { SummaryCache } from "./cache.js";
import { AgentSummarizer, OfflineSummarizer, summarizeSession } from "./summarizer.js";
import { startTracing } from "./tracer.js";
import type { Tracing } from "./tracer.js";
import { createFormatter } from "./formatters/index.js";
import { SessionNotFoundError } from "./errors.js";
import {
  ALL_CATEGORIES,
  DEFAULT_SEPARATOR,
  resolveConfig,
  resolveLangfuseConfig,
} from "./config.js";
import type { DetailLevel, DigestMetadata, MessageCategory, TurnSummarizer } from "./types.js";

export interface DigestOptions {
  project: string;
  session?: string;
  from?: Date;
  to?: Date;
  format: string;
  plain?: boolean;
  categories: MessageCategory[];
  summarize?: DetailLevel;
  offline?: boolean;
  separator?: string;
  metadata?: boolean;
  list?: boolean;
  clearCache?: boolean;
  verbose?: boolean;
  /** Show tool arguments in full when extracting. */
  noTruncate?: boolean;
  isTTY?: boolean;
}

export interface CategoryFlags {
  withPlans?: boolean;
  withSummaries?: boolean;
  withSubagent?: boolean;
  withAssistant?: boolean;
  withAll?: boolean;
}

/** User messages always; the flags add the other categories. */
export function categoriesFromFlags(flags: CategoryFlags): MessageCategory[] {
  if (flags.withAll) return [...ALL_CATEGORIES];
  const categories: MessageCategory[] = ["user"];
  if (flags.withPlans) categories.push("plan");
  if (flags.withSummaries) categories.push("session_summary");
  if (flags.withSubagent) categories.push("subagent");
  if (flags.withAssistant) categories.push("assistant");
  return categories;
}

export type Progress = (message: string) => void;

type Env = Record<string, string | undefined>;

/** Session files to read: one session plus the one it continues, or a date range. */
function resolveSessionFiles(options: DigestOptions): string[] {
  if (options.session) {
    const file = findSessionById(options.project, options.session);
    if (!file) {
      throw new SessionNotFoundError(`Session ${options.session} not found.`, options.project);
    }
    const previous = findPreviousSession(file);
    if (previous) debug(`Including previous session ${previous}`);
    return previous ? [previous, file] : [file];
  }

  return listSessions(options.project, { from: options.from, to: options.to })
    .map((session) => session.filePath)
    .reverse();
}

/**
 * Summaries of a requested session are cached under its file name, also
 * when the session it continues is read along with it.
 */
function cacheSessionId(project: string, session: string): string {
  const file = findSessionById(project, session);
  return file ? basename(file, ".jsonl") : session;
}

/**
 * Runs one digest and returns the text to print. Progress and statistics
 * go to `progress`, never into the returned output.
 */
export async function runDigest(
  options: DigestOptions,
  progress: Progress,
  env: Env = process.env,
): Promise<string> {
  const config = resolveConfig(env);
  const formatter = createFormatter(options.plain ? "plain" : options.format, options.isTTY);
  const formatOptions = {
    includeMetadata: options.metadata ?? false,
    verbose: options.verbose ?? false,
    separator: options.separator ?? DEFAULT_SEPARATOR,
  };

  if (options.clearCache) {
    const cache = new SummaryCache(config.cacheDir);
    const cleared = cache.clear(
      options.session ? cacheSessionId(options.project, options.session) : undefined,
    );
    log("INFO", `Cleared ${cleared} cache entries`);
    return options.session
      ? `Cleared ${cleared} cache entries for session ${options.session}.`
      : `Cleared ${cleared} cache entries.`;
  }

  if (options.list) {
    const sessions = listSessions(options.project, {
      from: options.from,
      to: options.to,
      includeEmpty: options.verbose ?? false,
    });
    if (sessions.length === 0) return describeSearch(options.project).join("\n");
    return formatter.formatSessionList(sessions, formatOptions);
  }

  const files = resolveSessionFiles(options);
  if (files.length === 0) return describeSearch(options.project).join("\n");

  progress(`Processing ${files.length} session files with deduplication...`);
  const result = processSessionFiles(files);
  for (const failure of result.failures) {
    progress(`Skipped ${failure.filePath}: ${failure.error}`);
  }
  if (result.invalidLines > 0) {
    progress(`Skipped ${result.invalidLines} malformed lines`);
  }
  if (result.status === "empty") {
    return `No messages found in ${files.length} session files.`;
  }
  progress(`Found ${result.turns.length} unique conversation turns after deduplication`);

  const metadata: DigestMetadata = {
    sessionId: files.length === 1 ? basename(files[0], ".jsonl") : `merged-${files.length}-sessions`,
    messageCount: result.messages.length,
    sessionCount: files.length,
    ...(result.messages[0]?.timestamp ? { startTime: result.messages[0].timestamp } : {}),
  };

  if (!options.summarize && !options.offline) {
    const messages = extractMessages(result.turns, options.categories, {
      noTruncate: options.noTruncate ?? false,
    });
    progress(`Extracted ${messages.length} messages (${options.categories.join(", ")})`);
    return formatter.formatMessages(messages, metadata, formatOptions);
  }

  const level = options.summarize ?? "normal";
  const langfuse = options.offline ? null : resolveLangfuseConfig(env);
  const tracing: Tracing | null = langfuse ? startTracing(langfuse) : null;
  const summarizer: TurnSummarizer = options.offline
    ? new OfflineSummarizer()
    : new AgentSummarizer({
        cache: new SummaryCache(config.cacheDir),
        model: config.model,
        traced: tracing !== null,
      });

  try {
    const summaries = await summarizeSession(
      result.turns,
      summarizer,
      level,
      options.session ? basename(files[files.length - 1], ".jsonl") : metadata.sessionId,
      (done, total) => progress(`Summarized turn ${done}/${total}`),
    );

    const failed = summaries.filter((summary) => summary.error).length;
    const tokens = summaries.reduce((sum, summary) => sum + (summary.tokensUsed ?? 0), 0);
    if (failed > 0) progress(`${failed} summaries failed`);
    if (tokens > 0) progress(`Used ${tokens} tokens`);
    progress(`Processed ${files.length} sessions → ${result.turns.length} unique turns`);

    return formatter.formatSessionSummary(result.turns, summaries, metadata, formatOptions);
  } finally {
    await tracing?.shutdown();
  }
}

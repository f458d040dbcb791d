import { readFileSync, readdirSync, statSync, existsSync } from "node:fs";
import { homedir } from "node:os";
import { basename, dirname, join, resolve } from "node:path";
import { log, debug } from "./logger.js";
import {
  buildMessage,
  compareByTimestamp,
  isRecord,
  toMessageContent,
} from "./content.js";
import { errorMessage, SessionNotFoundError } from "./errors.js";
import { parseIsoTimestamp } from "./timestamp.js";
import type { Message, SessionInfo } from "./types.js";

// --- Line parsing ---

export type ParsedLine =
  | { kind: "message"; message: Message }
  | { kind: "blank" }
  | { kind: "invalid"; lineNumber: number; reason: string };

export interface ParseOptions {
  /** Instant used for messages whose timestamp cannot be parsed. */
  now?: Date;
}

export function parseLine(
  line: string,
  lineNumber: number,
  parsedAt: Date,
): ParsedLine {
  const trimmed = line.trim();
  if (!trimmed) return { kind: "blank" };

  let data: unknown;
  try {
    data = JSON.parse(trimmed);
  } catch (e: unknown) {
    return { kind: "invalid", lineNumber, reason: `Invalid JSON: ${errorMessage(e)}` };
  }

  if (!isRecord(data)) {
    return { kind: "invalid", lineNumber, reason: "Record is not an object" };
  }

  return { kind: "message", message: buildMessage(data, { lineNumber, parsedAt }) };
}

export interface TranscriptParseResult {
  messages: Message[];
  /** 1-based numbers of lines that were skipped as malformed. */
  invalidLines: number[];
}

/**
 * Parses JSONL text into messages sorted by timestamp. Malformed lines are
 * logged and skipped; they never abort the parse.
 */
export function parseTranscript(
  text: string,
  { now = new Date() }: ParseOptions = {},
): TranscriptParseResult {
  const messages: Message[] = [];
  const invalidLines: number[] = [];

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const parsed = parseLine(lines[i], i + 1, now);
    switch (parsed.kind) {
      case "message":
        messages.push(parsed.message);
        break;
      case "invalid":
        log("WARN", `Skipping line ${parsed.lineNumber}: ${parsed.reason}`);
        invalidLines.push(parsed.lineNumber);
        break;
      case "blank":
        break;
    }
  }

  messages.sort(compareByTimestamp);
  return { messages, invalidLines };
}

export function parseSessionFile(
  filePath: string,
  options: ParseOptions = {},
): TranscriptParseResult {
  const result = parseTranscript(readFileSync(filePath, "utf8"), options);
  debug(
    `Parsed ${result.messages.length} messages from ${filePath} (${result.invalidLines.length} invalid lines)`,
  );
  return result;
}

// --- Session discovery ---

/** `/home/user/my-app` → `-home-user-my-app` */
export function projectDirName(projectPath: string): string {
  return projectPath.replaceAll("/", "-");
}

export function findProjectsDir(): string {
  const dir = join(homedir(), ".claude", "projects");
  if (!existsSync(dir)) {
    throw new SessionNotFoundError(
      `Claude Code projects directory not found at ${dir}. Make sure Claude Code has been used at least once.`,
      undefined,
      dir,
    );
  }
  return dir;
}

export function projectSessionDir(projectPath: string): string {
  return join(findProjectsDir(), projectDirName(resolve(projectPath)));
}

/** Session files of a project, newest first; subagent `agent-*` files excluded. */
export function findSessionFiles(projectPath: string): string[] {
  const dir = projectSessionDir(projectPath);
  if (!existsSync(dir)) return [];

  return readdirSync(dir)
    .filter((name) => name.endsWith(".jsonl") && !name.startsWith("agent-"))
    .map((name) => join(dir, name))
    .map((file) => ({ file, mtime: statSync(file).mtimeMs }))
    .sort((a, b) => b.mtime - a.mtime)
    .map(({ file }) => file);
}

const SKIPPED_DESCRIPTION_PREFIXES = ["<command-", "<local-command-", "Caveat:"];

function isDescriptionCandidate(text: string): boolean {
  return (
    text !== "" &&
    !SKIPPED_DESCRIPTION_PREFIXES.some((p) => text.startsWith(p)) &&
    text.trim() !== "Warmup"
  );
}

function firstUserText(record: Record<string, unknown>): string | undefined {
  const body = isRecord(record.message) ? record.message : undefined;
  const content = toMessageContent(body?.content ?? "");
  if (typeof content === "string") {
    return isDescriptionCandidate(content) ? content : undefined;
  }
  for (const block of content) {
    if (block.type === "text" && isDescriptionCandidate(block.text)) {
      return block.text;
    }
  }
  return undefined;
}

function sessionStem(filePath: string): string {
  return basename(filePath, ".jsonl");
}

export function readSessionInfo(filePath: string): SessionInfo {
  const stat = statSync(filePath);
  let sessionId = sessionStem(filePath);
  let startTime: string | undefined;
  let summary: string | undefined;
  let firstUser: string | undefined;
  let lineCount = 0;

  for (const line of readFileSync(filePath, "utf8").split(/\r?\n/)) {
    if (!line.trim()) continue;
    lineCount++;

    let record: unknown;
    try {
      record = JSON.parse(line);
    } catch {
      debug(`Skipping malformed line ${lineCount} in ${filePath}`);
      continue;
    }
    if (!isRecord(record)) continue;

    if (record.type === "summary" && typeof record.summary === "string" && record.summary) {
      summary = record.summary;
    }
    if (startTime === undefined && typeof record.sessionId === "string" && record.sessionId) {
      sessionId = record.sessionId;
      startTime = typeof record.timestamp === "string" ? record.timestamp : undefined;
    }
    if (firstUser === undefined && record.type === "user") {
      firstUser = firstUserText(record);
    }
  }

  const description = (summary ?? firstUser ?? "").split(/\s+/).filter(Boolean).join(" ");

  return {
    sessionId,
    filePath,
    lineCount,
    ...(startTime ? { startTime } : {}),
    lastModified: stat.mtime.toISOString(),
    fileSize: stat.size,
    description,
    hasContent: Boolean(summary || firstUser),
  };
}

export interface ListSessionsOptions {
  from?: Date;
  to?: Date;
  limit?: number;
  includeEmpty?: boolean;
}

function sessionDate(session: SessionInfo): Date | null {
  return parseIsoTimestamp(session.startTime ?? session.lastModified);
}

export function filterSessionsByDate(
  sessions: SessionInfo[],
  from?: Date,
  to?: Date,
): SessionInfo[] {
  return sessions.filter((session) => {
    const date = sessionDate(session);
    if (!date) return false;
    if (from && date < from) return false;
    if (to && date > to) return false;
    return true;
  });
}

export function listSessions(
  projectPath: string,
  { from, to, limit, includeEmpty = false }: ListSessionsOptions = {},
): SessionInfo[] {
  let sessions = findSessionFiles(projectPath)
    .map(readSessionInfo)
    .filter((session) => includeEmpty || session.hasContent);

  if (from || to) sessions = filterSessionsByDate(sessions, from, to);
  if (limit) sessions = sessions.slice(0, limit);
  return sessions;
}

/** Exact id match first, then the most recent file whose name starts with `sessionId`. */
export function findSessionById(
  projectPath: string,
  sessionId: string,
): string | null {
  const files = findSessionFiles(projectPath);
  const exact = files.find((file) => sessionStem(file) === sessionId);
  if (exact) return exact;
  return files.find((file) => sessionStem(file).startsWith(sessionId)) ?? null;
}

/**
 * A continued session's first record carries the id of the session it
 * continues; that session's file sits beside it.
 */
export function findPreviousSession(transcriptPath: string): string | null {
  try {
    const content = readFileSync(transcriptPath, "utf8");
    const firstNewline = content.indexOf("\n");
    const firstLine =
      firstNewline === -1 ? content : content.slice(0, firstNewline);
    if (!firstLine.trim()) return null;

    const parsed: unknown = JSON.parse(firstLine);
    if (!isRecord(parsed) || typeof parsed.sessionId !== "string") return null;
    if (parsed.sessionId === sessionStem(transcriptPath)) return null;

    const previousPath = join(dirname(transcriptPath), `${parsed.sessionId}.jsonl`);
    return existsSync(previousPath) ? previousPath : null;
  } catch {
    debug("Failed to detect previous session from transcript first line");
    return null;
  }
}

/** Lines explaining where sessions were looked for. */
export function describeSearch(projectPath: string): string[] {
  const lines = ["No sessions found matching criteria.", ""];
  const absolute = resolve(projectPath);
  let dir: string;
  try {
    dir = projectSessionDir(projectPath);
  } catch (e: unknown) {
    lines.push(`Error: ${errorMessage(e)}`);
    return lines;
  }

  lines.push(`Project path: ${absolute}`, `Searched in: ${dir}`);
  if (!existsSync(dir)) {
    lines.push(
      "",
      "The session directory does not exist.",
      "This could mean:",
      "  - Claude Code hasn't been used in this project yet",
      "  - The project path is incorrect",
      "",
      "Tip: Run 'session-digest --list' from within your project directory",
    );
  }
  return lines;
}

import { homedir } from "node:os";
import { join } from "node:path";
import type { DetailLevel, MessageCategory } from "./types.js";

// Truncation limits
export const CONTENT_TRUNCATION_TERMINAL = 2000;
export const TOOL_COMMAND_TRUNCATION = 50;

/** Characters of a Task prompt used to recognise its echo as a user message. */
export const SUBAGENT_PREFIX_LENGTH = 150;
/** A continuation summary must be longer than this to count as one. */
export const SESSION_SUMMARY_MIN_LENGTH = 1000;

export const DEFAULT_MODEL = "claude-haiku-4-5";
export const DEFAULT_SEPARATOR = "—".repeat(24);

export const DETAIL_LEVELS: readonly DetailLevel[] = [
  "minimal",
  "normal",
  "detailed",
];

export const MINIMAL_TOOLS = ["Edit", "MultiEdit", "Write", "Bash"];
export const NORMAL_TOOLS = [...MINIMAL_TOOLS, "Read", "Grep", "Glob", "LS", "Task"];

export const ALL_CATEGORIES: MessageCategory[] = [
  "user",
  "subagent",
  "plan",
  "assistant",
  "session_summary",
];
export const EXCLUDED_CATEGORIES: ReadonlySet<MessageCategory> = new Set([
  "system_noise",
  "tool_response",
]);

export const CATEGORY_LABELS: Partial<Record<MessageCategory, string>> = {
  user: "USER",
  assistant: "ASSISTANT",
  subagent: "SUBAGENT",
  plan: "PLAN",
  session_summary: "SUMMARY",
};

export function isDetailLevel(value: unknown): value is DetailLevel {
  return DETAIL_LEVELS.some((level) => level === value);
}

export interface LangfuseConfig {
  publicKey: string;
  secretKey: string;
  baseUrl?: string;
}

export interface DigestConfig {
  cacheDir: string;
  model: string;
  projectsDir: string;
}

type Env = Record<string, string | undefined>;

export function resolveConfig(env: Env = process.env): DigestConfig {
  return {
    cacheDir:
      env.SESSION_DIGEST_CACHE_DIR || join(homedir(), ".cache", "session-digest"),
    model: env.SESSION_DIGEST_MODEL || DEFAULT_MODEL,
    projectsDir: join(homedir(), ".claude", "projects"),
  };
}

/**
 * Langfuse credentials, or null when tracing is off or keys are missing.
 * Tool-specific variables win over the generic Langfuse ones.
 */
export function resolveLangfuseConfig(
  env: Env = process.env,
): LangfuseConfig | null {
  if ((env.TRACE_TO_LANGFUSE ?? "").toLowerCase() !== "true") return null;

  const publicKey =
    env.SESSION_DIGEST_LANGFUSE_PUBLIC_KEY ?? env.LANGFUSE_PUBLIC_KEY;
  const secretKey =
    env.SESSION_DIGEST_LANGFUSE_SECRET_KEY ?? env.LANGFUSE_SECRET_KEY;
  const baseUrl =
    env.SESSION_DIGEST_LANGFUSE_BASE_URL ?? env.LANGFUSE_BASE_URL;

  if (!publicKey || !secretKey) return null;

  return { publicKey, secretKey, baseUrl: baseUrl || undefined };
}

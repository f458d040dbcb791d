import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  rmSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { debug, log } from "./logger.js";
import { isRecord, shortHash } from "./content.js";
import { errorMessage } from "./errors.js";
import { isDetailLevel } from "./config.js";
import type { DetailLevel, SummaryResult } from "./types.js";

export interface CacheEntry {
  summary: string;
  tool_calls: string[];
  error?: string;
  tokens_used?: number;
  cached_at: string;
  session_id: string;
  content_hash: string;
  detail_level: DetailLevel;
}

export interface CacheStats {
  successfulSummaries: number;
  failedSummaries: number;
  totalSizeBytes: number;
}

function isCacheEntry(data: unknown): data is CacheEntry {
  return (
    isRecord(data) &&
    typeof data.summary === "string" &&
    Array.isArray(data.tool_calls) &&
    data.tool_calls.every((call) => typeof call === "string") &&
    (data.error === undefined || typeof data.error === "string") &&
    (data.tokens_used === undefined || typeof data.tokens_used === "number") &&
    typeof data.session_id === "string" &&
    typeof data.content_hash === "string" &&
    isDetailLevel(data.detail_level)
  );
}

function toResult(entry: CacheEntry): SummaryResult {
  return {
    summary: entry.summary,
    toolCalls: entry.tool_calls,
    ...(entry.error !== undefined ? { error: entry.error } : {}),
    ...(entry.tokens_used !== undefined ? { tokensUsed: entry.tokens_used } : {}),
  };
}

/**
 * Summaries on disk, one JSON file per (session, content, detail level).
 * Failed summaries live under `errors/` so they can be listed and retried.
 */
export class SummaryCache {
  readonly summariesDir: string;
  readonly errorsDir: string;

  constructor(readonly cacheDir: string) {
    this.summariesDir = join(cacheDir, "summaries");
    this.errorsDir = join(cacheDir, "errors");
    this.ensureDirs();
  }

  static key(sessionId: string, content: string, level: DetailLevel): string {
    return `${sessionId}_${shortHash(content)}_${level}`;
  }

  get(sessionId: string, content: string, level: DetailLevel): SummaryResult | null {
    const key = SummaryCache.key(sessionId, content, level);
    for (const dir of [this.summariesDir, this.errorsDir]) {
      const entry = this.readEntry(join(dir, `${key}.json`));
      if (entry) return toResult(entry);
    }
    return null;
  }

  store(
    sessionId: string,
    content: string,
    level: DetailLevel,
    result: SummaryResult,
  ): void {
    const contentHash = shortHash(content);
    const key = `${sessionId}_${contentHash}_${level}`;
    const dir = result.error ? this.errorsDir : this.summariesDir;
    const entry: CacheEntry = {
      summary: result.summary,
      tool_calls: result.toolCalls,
      ...(result.error !== undefined ? { error: result.error } : {}),
      ...(result.tokensUsed !== undefined ? { tokens_used: result.tokensUsed } : {}),
      cached_at: new Date().toISOString(),
      session_id: sessionId,
      content_hash: contentHash,
      detail_level: level,
    };

    try {
      writeFileSync(join(dir, `${key}.json`), JSON.stringify(entry, null, 2));
    } catch (e: unknown) {
      log("WARN", `Failed to cache summary: ${errorMessage(e)}`);
    }
  }

  /** Removes entries of one session, or every entry. Returns how many went. */
  clear(sessionId?: string): number {
    let cleared = 0;
    for (const dir of [this.summariesDir, this.errorsDir]) {
      for (const file of this.entryFiles(dir)) {
        if (sessionId && !file.startsWith(`${sessionId}_`)) continue;
        unlinkSync(join(dir, file));
        cleared++;
      }
    }
    return cleared;
  }

  clearAll(): void {
    rmSync(this.cacheDir, { recursive: true, force: true });
    this.ensureDirs();
  }

  failedEntries(sessionId?: string): CacheEntry[] {
    const entries: CacheEntry[] = [];
    for (const file of this.entryFiles(this.errorsDir)) {
      if (sessionId && !file.startsWith(`${sessionId}_`)) continue;
      const entry = this.readEntry(join(this.errorsDir, file));
      if (entry) entries.push(entry);
    }
    return entries;
  }

  stats(): CacheStats {
    const sizeOf = (dir: string) =>
      this.entryFiles(dir).reduce((sum, file) => sum + statSync(join(dir, file)).size, 0);
    return {
      successfulSummaries: this.entryFiles(this.summariesDir).length,
      failedSummaries: this.entryFiles(this.errorsDir).length,
      totalSizeBytes: sizeOf(this.summariesDir) + sizeOf(this.errorsDir),
    };
  }

  private ensureDirs(): void {
    mkdirSync(this.summariesDir, { recursive: true });
    mkdirSync(this.errorsDir, { recursive: true });
  }

  private entryFiles(dir: string): string[] {
    if (!existsSync(dir)) return [];
    return readdirSync(dir).filter((name) => name.endsWith(".json"));
  }

  /** Reads one entry; a corrupt file is deleted and treated as a miss. */
  private readEntry(path: string): CacheEntry | null {
    if (!existsSync(path)) return null;
    try {
      const data: unknown = JSON.parse(readFileSync(path, "utf8"));
      if (isCacheEntry(data)) return data;
      debug(`Cache entry has invalid shape: ${path}`);
    } catch (e: unknown) {
      debug(`Failed to read cache entry ${path}: ${errorMessage(e)}`);
    }
    rmSync(path, { force: true });
    return null;
  }
}

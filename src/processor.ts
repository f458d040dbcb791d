import { log, debug } from "./logger.js";
import { parseSessionFile } from "./filesystem.js";
import type { ParseOptions } from "./filesystem.js";
import { deduplicateMessages } from "./dedupe.js";
import { categorizeMessages } from "./categorizer.js";
import type { CategorizeOptions } from "./categorizer.js";
import { groupTurns } from "./parser.js";
import { errorMessage } from "./errors.js";
import type { ConversationTurn, Message } from "./types.js";

export interface FileFailure {
  filePath: string;
  error: string;
}

export type ProcessResult =
  | {
      status: "ok";
      /** Deduplicated, categorized messages in chronological order. */
      messages: Message[];
      turns: ConversationTurn[];
      absorbed: Message[];
      preamble: Message[];
      failures: FileFailure[];
      invalidLines: number;
    }
  | {
      status: "empty";
      failures: FileFailure[];
      invalidLines: number;
    };

export type ProcessOptions = ParseOptions & CategorizeOptions;

/**
 * Parses each file on its own, then dedupes, categorizes and groups the
 * combined stream. A file that cannot be read is skipped and reported.
 */
export function processSessionFiles(
  filePaths: readonly string[],
  options: ProcessOptions = {},
): ProcessResult {
  const now = options.now ?? new Date();
  const collected: Message[] = [];
  const failures: FileFailure[] = [];
  let invalidLines = 0;

  for (const filePath of filePaths) {
    try {
      const parsed = parseSessionFile(filePath, { now });
      collected.push(...parsed.messages);
      invalidLines += parsed.invalidLines.length;
    } catch (e: unknown) {
      const error = errorMessage(e);
      log("ERROR", `Failed to read ${filePath}: ${error}`);
      failures.push({ filePath, error });
    }
  }

  if (collected.length === 0) {
    debug(`No parseable messages in ${filePaths.length} files`);
    return { status: "empty", failures, invalidLines };
  }

  const unique = deduplicateMessages(collected);
  debug(
    `Deduplicated ${collected.length} messages to ${unique.length} across ${filePaths.length} files`,
  );

  const messages = categorizeMessages(unique, options);
  const { turns, absorbed, preamble } = groupTurns(messages);

  return {
    status: "ok",
    messages,
    turns,
    absorbed,
    preamble,
    failures,
    invalidLines,
  };
}

import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { Command } from "commander";
import * as dotenv from "dotenv";
import { log } from "./logger.js";
import { categoriesFromFlags, runDigest } from "./digest.js";
import type { DigestOptions } from "./digest.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { DEFAULT_SEPARATOR, isDetailLevel } from "./config.js";
import { parseSinceDate } from "./timestamp.js";
import type { DetailLevel } from "./types.js";

interface CliOptions {
  project: string;
  session?: string;
  from?: string;
  to?: string;
  since?: string;
  format: string;
  withPlans?: boolean;
  withSummaries?: boolean;
  withSubagent?: boolean;
  withAssistant?: boolean;
  withAll?: boolean;
  summarize?: string | boolean;
  offline?: boolean;
  plain?: boolean;
  separator: string;
  output?: string;
  metadata?: boolean;
  list?: boolean;
  clearCache?: boolean;
  verbose?: boolean;
  truncate?: boolean;
}

function detailLevel(value: string | boolean | undefined): DetailLevel | undefined {
  if (value === undefined || value === false) return undefined;
  if (value === true) return "normal";
  if (isDetailLevel(value)) return value;
  throw new ConfigurationError(
    `Invalid summarize level '${value}'. Expected minimal, normal or detailed`,
    "summarize",
  );
}

/** Turns parsed command-line flags into digest options. */
export function toDigestOptions(opts: CliOptions, now: Date = new Date()): DigestOptions {
  const since = opts.since ? parseSinceDate(opts.since, now) : undefined;
  const from = since ?? (opts.from ? parseSinceDate(opts.from, now) : undefined);
  const to = opts.to ? parseSinceDate(opts.to, now) : undefined;
  const summarize = detailLevel(opts.summarize);

  return {
    project: resolve(opts.project),
    ...(opts.session ? { session: opts.session } : {}),
    ...(from ? { from } : {}),
    ...(to ? { to } : {}),
    format: opts.format,
    plain: opts.plain ?? false,
    categories: categoriesFromFlags(opts),
    ...(summarize ? { summarize } : {}),
    offline: opts.offline ?? false,
    separator: opts.separator,
    metadata: opts.metadata ?? false,
    list: opts.list ?? false,
    clearCache: opts.clearCache ?? false,
    verbose: opts.verbose ?? false,
    noTruncate: opts.truncate === false,
  };
}

export function createProgram(): Command {
  const program = new Command();
  program
    .name("session-digest")
    .description("List, extract and summarize Claude Code session logs")
    .version("0.1.0")
    .option("-p, --project <path>", "project directory", ".")
    .option("-s, --session <id>", "session id (or prefix) to process")
    .option("--from <date>", "start date filter")
    .option("--to <date>", "end date filter")
    .option("--since <when>", "relative (1d, 2h, 30m, 1w) or absolute start date")
    .option("--format <format>", "auto|terminal|markdown|plain|jsonl", "auto")
    .option("--with-plans", "include assistant plan responses")
    .option("--with-summaries", "include session summary messages")
    .option("--with-subagent", "include subagent prompts")
    .option("--with-assistant", "include assistant responses")
    .option("--with-all", "include all message categories")
    .option("--summarize [level]", "summarize turns with a model: minimal|normal|detailed")
    .option("--offline", "summarize from the logs only, without a model")
    .option("--plain", "force plain text output")
    .option("--separator <text>", "separator between items in plain output", DEFAULT_SEPARATOR)
    .option("-o, --output <file>", "write output to a file instead of stdout")
    .option("--metadata", "include timestamps, durations and token counts")
    .option("--list", "list sessions for the project")
    .option("--clear-cache", "clear the summary cache (for --session only, if given)")
    .option("-v, --verbose", "show full session ids and empty sessions")
    .option("--no-truncate", "show extracted tool arguments in full")
    .action(async () => {
      const opts = program.opts<CliOptions>();
      const output = await runDigest(toDigestOptions(opts), (message) => {
        process.stderr.write(`${message}\n`);
      });
      if (opts.output) {
        writeFileSync(opts.output, `${output}\n`);
        process.stderr.write(`Wrote ${opts.output}\n`);
      } else {
        process.stdout.write(`${output}\n`);
      }
    });
  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  dotenv.config();
  try {
    await createProgram().parseAsync(argv);
  } catch (e: unknown) {
    const message = errorMessage(e);
    log("ERROR", message);
    process.stderr.write(`Error: ${message}\n`);
    process.exitCode = 1;
  }
}

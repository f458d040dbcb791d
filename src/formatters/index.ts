import { ConfigurationError } from "../errors.js";
import { JsonlFormatter } from "./jsonl.js";
import { MarkdownFormatter } from "./markdown.js";
import { PlainFormatter } from "./plain.js";
import { TerminalFormatter } from "./terminal.js";
import type { Formatter } from "./base.js";

export type { FormatOptions, Formatter } from "./base.js";
export { JsonlFormatter, MarkdownFormatter, PlainFormatter, TerminalFormatter };

export const OUTPUT_FORMATS = ["auto", "terminal", "markdown", "plain", "jsonl"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/** `auto` is `terminal` on a TTY and `plain` otherwise. */
export function createFormatter(format: string, isTTY = Boolean(process.stdout.isTTY)): Formatter {
  if (!isOutputFormat(format)) {
    throw new ConfigurationError(
      `Unknown format "${format}". Expected one of: ${OUTPUT_FORMATS.join(", ")}`,
      "format",
    );
  }
  switch (format) {
    case "auto":
      return isTTY ? new TerminalFormatter() : new PlainFormatter();
    case "terminal":
      return new TerminalFormatter();
    case "markdown":
      return new MarkdownFormatter();
    case "plain":
      return new PlainFormatter();
    case "jsonl":
      return new JsonlFormatter();
  }
}

import { ConfigurationError } from "./errors.js";

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?)?(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * Parses an ISO-8601 timestamp (with or without a `Z` suffix).
 * A timestamp without a zone offset is read as UTC.
 */
export function parseIsoTimestamp(value: string | undefined): Date | null {
  if (!value) return null;
  const match = ISO_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, year, month, day, hour = "00", minute = "00", second = "00", fraction = "", zone] =
    match;
  const offset = zone ? normalizeOffset(zone) : "Z";
  const date = new Date(
    `${year}-${month}-${day}T${hour}:${minute}:${second}${fraction}${offset}`,
  );
  return Number.isNaN(date.getTime()) ? null : date;
}

function normalizeOffset(zone: string): string {
  if (zone.toUpperCase() === "Z") return "Z";
  return zone.includes(":") ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `MM-DD HH:MM:SS` in UTC. */
export function formatTimestampShort(date: Date | null): string {
  if (!date) return "";
  return `${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ${formatTime(date)}`;
}

/** `YYYY-MM-DD HH:MM:SS UTC`. */
export function formatTimestampFull(date: Date | null): string {
  if (!date) return "";
  return `${date.toISOString().slice(0, 10)} ${formatTime(date)} UTC`;
}

/** `YYYY-MM-DD HH:MM` in UTC. */
export function formatTimestampDate(date: Date | null): string {
  if (!date) return "";
  return `${date.toISOString().slice(0, 10)} ${formatTime(date).slice(0, 5)}`;
}

/** `HH:MM:SS` in UTC. */
export function formatTime(date: Date): string {
  return `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

const RELATIVE_PATTERN = /^(\d+)([dhwm])$/;

const UNIT_MS: Record<string, number> = {
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000,
};

/**
 * Parses a `--since` value: relative (`1d`, `2h`, `30m`, `1w`) or an
 * absolute ISO-like date (`2024-12-01`, `2024-12-01 10:00`, ...).
 */
export function parseSinceDate(value: string, now: Date = new Date()): Date {
  const trimmed = value.trim();
  const relative = RELATIVE_PATTERN.exec(trimmed.toLowerCase());
  if (relative) {
    const amount = Number(relative[1]);
    return new Date(now.getTime() - amount * UNIT_MS[relative[2]]);
  }

  const absolute = parseIsoTimestamp(trimmed);
  if (absolute) return absolute;

  throw new ConfigurationError(
    `Invalid date format: '${value}'. Supported formats: relative (1d, 2h, 30m, 1w) or absolute (2024-12-01, 2024-12-01T10:00)`,
    "since",
  );
}

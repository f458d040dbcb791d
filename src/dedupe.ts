import { compareByTimestamp, hashContent } from "./content.js";
import type { Message } from "./types.js";

/**
 * Removes repeated events from one or more transcripts, keeping the earliest
 * occurrence. A message is a duplicate when its uuid was already seen, or
 * failing that, when its content hashes the same as a kept message.
 *
 * Continuation files replay earlier events, sometimes under synthesized
 * `line_<n>` ids that collide across files, so the content hash is needed
 * on top of the uuid check.
 */
export function deduplicateMessages(messages: readonly Message[]): Message[] {
  const seenUuids = new Set<string>();
  const seenHashes = new Set<string>();
  const unique: Message[] = [];

  for (const msg of [...messages].sort(compareByTimestamp)) {
    if (msg.uuid && seenUuids.has(msg.uuid)) continue;

    const hash = hashContent(msg.content);
    if (seenHashes.has(hash)) continue;

    if (msg.uuid) seenUuids.add(msg.uuid);
    seenHashes.add(hash);
    unique.push(msg);
  }

  return unique;
}

import { describe, it, expect } from "vitest";
import { deduplicateMessages } from "../src/dedupe.js";
import { makeMessage } from "./helpers/messages.js";

describe("deduplicateMessages", () => {
  it("keeps the earliest message of a repeated uuid", () => {
    const later = makeMessage({ uuid: "x", timestamp: "2025-01-01T10:00:01Z", content: "a" });
    const earlier = makeMessage({ uuid: "x", timestamp: "2025-01-01T10:00:00Z", content: "b" });
    expect(deduplicateMessages([later, earlier])).toEqual([earlier]);
  });

  it("drops repeated content under a different uuid", () => {
    const first = makeMessage({ uuid: "line_1", timestamp: "2025-01-01T10:00:00Z", content: "same" });
    const copy = makeMessage({ uuid: "other", timestamp: "2025-01-01T10:00:05Z", content: "same" });
    expect(deduplicateMessages([first, copy])).toEqual([first]);
  });

  it("compares block content regardless of key order", () => {
    const first = makeMessage({ uuid: "a", content: [{ type: "text", text: "hi" }] });
    const copy = makeMessage({ uuid: "b", content: [{ text: "hi", type: "text" }] });
    expect(deduplicateMessages([first, copy])).toHaveLength(1);
  });

  it("remembers uuids of kept messages only", () => {
    const kept = makeMessage({ uuid: "a", timestamp: "2025-01-01T10:00:00Z", content: "c" });
    const dropped = makeMessage({ uuid: "b", timestamp: "2025-01-01T10:00:01Z", content: "c" });
    const reused = makeMessage({ uuid: "b", timestamp: "2025-01-01T10:00:02Z", content: "d" });
    expect(deduplicateMessages([kept, dropped, reused])).toEqual([kept, reused]);
  });

  it("is idempotent", () => {
    const messages = [
      makeMessage({ uuid: "a", timestamp: "2025-01-01T10:00:02Z", content: "one" }),
      makeMessage({ uuid: "b", timestamp: "2025-01-01T10:00:00Z", content: "two" }),
      makeMessage({ uuid: "a", timestamp: "2025-01-01T10:00:03Z", content: "three" }),
      makeMessage({ uuid: "c", timestamp: "2025-01-01T10:00:01Z", content: "two" }),
    ];
    const once = deduplicateMessages(messages);
    expect(once.map((m) => m.uuid)).toEqual(["b", "a"]);
    expect(deduplicateMessages(once)).toEqual(once);
  });

  it("leaves its input untouched", () => {
    const messages = [
      makeMessage({ uuid: "b", timestamp: "2025-01-01T10:00:01Z", content: "1" }),
      makeMessage({ uuid: "a", timestamp: "2025-01-01T10:00:00Z", content: "2" }),
    ];
    deduplicateMessages(messages);
    expect(messages.map((m) => m.uuid)).toEqual(["b", "a"]);
  });
});

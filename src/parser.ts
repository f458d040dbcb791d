import { getTimestamp } from "./content.js";
import type {
  ConversationTurn,
  GroupTurnsResult,
  Message,
  MessageCategory,
} from "./types.js";

/** User-type messages in these categories never open a turn. */
const ABSORBED_CATEGORIES: ReadonlySet<MessageCategory> = new Set([
  "tool_response",
  "session_summary",
  "system_noise",
]);

export function calculateTurnDuration(
  userMessage: Message,
  assistantMessages: readonly Message[],
): number | null {
  const last = assistantMessages[assistantMessages.length - 1];
  if (!last) return null;
  return (getTimestamp(last).getTime() - getTimestamp(userMessage).getTime()) / 1000;
}

export function calculateTurnTokens(
  assistantMessages: readonly Message[],
): number | null {
  let total = 0;
  let found = false;
  for (const msg of assistantMessages) {
    if (!msg.usage) continue;
    total +=
      (msg.usage.input_tokens ?? 0) +
      (msg.usage.output_tokens ?? 0) +
      (msg.usage.cache_creation_input_tokens ?? 0) +
      (msg.usage.cache_read_input_tokens ?? 0);
    found = true;
  }
  return found ? total : null;
}

class TurnBuilder {
  private turns: ConversationTurn[] = [];
  private absorbed: Message[] = [];
  private preamble: Message[] = [];
  private currentUser: Message | null = null;
  private currentAssistants: Message[] = [];
  private currentSystem: Message[] = [];
  private currentTools: Message[] = [];

  build(messages: readonly Message[]): GroupTurnsResult {
    for (const msg of messages) {
      if (msg.type === "user") {
        this.handleUser(msg);
      } else if (this.currentUser === null) {
        this.preamble.push(msg);
      } else if (msg.type === "assistant") {
        this.currentAssistants.push(msg);
      } else if (msg.type === "system") {
        this.currentSystem.push(msg);
      } else {
        this.currentTools.push(msg);
      }
    }

    this.finalizeTurn();
    return { turns: this.turns, absorbed: this.absorbed, preamble: this.preamble };
  }

  private handleUser(msg: Message): void {
    if (msg.category !== null && ABSORBED_CATEGORIES.has(msg.category)) {
      this.absorbed.push(msg);
      return;
    }

    this.finalizeTurn();

    this.currentUser = msg;
    this.currentAssistants = [];
    this.currentSystem = [];
    this.currentTools = [];
  }

  private finalizeTurn(): void {
    if (this.currentUser === null) return;

    this.turns.push({
      userMessage: this.currentUser,
      assistantMessages: this.currentAssistants,
      systemMessages: this.currentSystem,
      toolMessages: this.currentTools,
      durationSeconds: calculateTurnDuration(this.currentUser, this.currentAssistants),
      totalTokens: calculateTurnTokens(this.currentAssistants),
    });
    this.currentUser = null;
  }
}

/**
 * Groups categorized, chronologically ordered messages into turns and
 * reports the messages that belong to none.
 */
export function groupTurns(messages: readonly Message[]): GroupTurnsResult {
  return new TurnBuilder().build(messages);
}

export function buildConversationTurns(
  messages: readonly Message[],
): ConversationTurn[] {
  return groupTurns(messages).turns;
}

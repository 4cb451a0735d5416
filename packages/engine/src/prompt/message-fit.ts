// ──────────────────────────────────────────────
// Weft - Message history budget fitting
// ──────────────────────────────────────────────

import type { ChatMessage, LengthUnit } from "@weft/types";
import { DEFAULT_USER_TURN } from "@weft/types";
import { estimateTokens } from "@weft/utils";

export const BUDGET_SCALE = 0.97;

export type LengthMeasure = (text: string) => number;

export function measureFor(unit: LengthUnit): LengthMeasure {
  return unit === "tokens" ? estimateTokens : (text) => text.length;
}

// [system] + history, never ending on an assistant turn, never without a user turn
export function buildCandidateMessages(systemPrompt: string, history: ChatMessage[]): ChatMessage[] {
  const turns = history.at(-1)?.role === "assistant" ? history.slice(0, -1) : history;
  const messages: ChatMessage[] = [{ role: "system", content: systemPrompt }, ...turns];
  if (messages.length === 1) {
    messages.push({ role: "user", content: DEFAULT_USER_TURN });
  }
  return messages;
}

// Greedy, newest first. The system message is always kept and so is
// at least one other message, however long.
export function fitMessages(
  messages: ChatMessage[],
  maxLength: number,
  measure: LengthMeasure
): ChatMessage[] {
  let total = 0;
  const head: ChatMessage[] = [];
  let rest = messages;

  const first = messages[0];
  if (first && first.role === "system") {
    total += measure(first.content);
    head.push(first);
    rest = messages.slice(1);
  }

  const tail: ChatMessage[] = [];
  for (const message of [...rest].reverse()) {
    total += measure(message.content);
    if (total > maxLength && tail.length > 0) break;
    tail.unshift(message);
    if (total > maxLength) break;
  }

  return [...head, ...tail];
}

export interface PreparedMessages {
  systemPrompt: string;
  messages: ChatMessage[];
}

export function prepareMessages(
  systemPrompt: string,
  history: ChatMessage[],
  maxLength: number,
  unit: LengthUnit
): PreparedMessages {
  const candidates = buildCandidateMessages(systemPrompt, history);
  const fitted = fitMessages(candidates, Math.floor(maxLength * BUDGET_SCALE), measureFor(unit));

  const [first, ...others] = fitted;
  const hasSystem = first?.role === "system";
  const chat = hasSystem ? others : fitted;

  return {
    systemPrompt: hasSystem && first ? first.content : "",
    messages: chat.length > 0 ? chat : [{ role: "user", content: DEFAULT_USER_TURN }],
  };
}

// src/services/promptAssembler.ts
import { AgentDefinition } from '../types/agent.js';
import { ChatMessage, ContextBudget, ConversationTurn } from '../types/conversation.js';
import { EmptyMessageError } from '../utils/errorHandler.js';

export const CHARS_PER_TOKEN = 4;

/**
 * Fixed estimator: one token per four characters, rounded up, and at least one
 * token for any non-empty text.
 */
export function estimateTokens(text: string): number {
  if (text.length === 0) {
    return 0;
  }
  return Math.max(1, Math.ceil(text.length / CHARS_PER_TOKEN));
}

/**
 * The most recent run of turns that fits the budget next to `reservedTokens`.
 * Walks back from the newest turn and stops at the first one that does not fit,
 * so the result is always a contiguous suffix in chronological order.
 */
export function selectHistory(
  history: readonly ConversationTurn[],
  reservedTokens: number,
  budget?: ContextBudget
): ConversationTurn[] {
  const maxTokens = budget?.maxContextTokens;
  const maxTurns = budget?.maxHistoryTurns;

  if (maxTokens === undefined && maxTurns === undefined) {
    return [...history];
  }

  let used = reservedTokens;
  let start = history.length;

  for (let i = history.length - 1; i >= 0; i--) {
    const kept = history.length - start;
    if (maxTurns !== undefined && kept >= maxTurns) {
      break;
    }

    const cost = estimateTokens(history[i].content);
    if (maxTokens !== undefined && used + cost > maxTokens) {
      break;
    }

    used += cost;
    start = i;
  }

  return history.slice(start);
}

/**
 * Messages for one completion call: the agent's system prompt as written, the
 * history that fits the budget, then the new user message (trimmed).
 *
 * The budget only ever drops history. Neither the system prompt nor the new
 * message is shortened, even when they alone are over it.
 */
export function buildMessages(
  agent: Pick<AgentDefinition, 'systemPrompt'>,
  history: readonly ConversationTurn[],
  newUserMessage: string,
  budget?: ContextBudget
): ChatMessage[] {
  const content = newUserMessage.trim();
  if (!content) {
    throw new EmptyMessageError();
  }

  const reserved = estimateTokens(agent.systemPrompt) + estimateTokens(content);
  const kept = selectHistory(history, reserved, budget);

  return [
    { role: 'system', content: agent.systemPrompt },
    ...kept.map((turn): ChatMessage => ({ role: turn.role, content: turn.content })),
    { role: 'user', content }
  ];
}

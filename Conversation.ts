// Conversation.ts
// ===============
// Turns a parsed document into the message list sent to the model.

import type { Role, Turn } from './Document';
import { expandPlaceholders, type Overrides } from './Placeholders';

export interface ChatMessage {
  role: Role;
  content: string;
}

export interface Conversation {
  messages: ChatMessage[];
  level: number;
  temperature: number;
  warnings: string[];
}

export interface BuildOptions {
  root: string;
  defaultLevel: number;
  defaultTemperature: number;
}

/**
 * Expands every user turn and resolves the effective overrides.
 *
 * Overrides are resolved over the whole history: a level or temperature set
 * in an early turn stays in force until a later turn sets it again. Turns
 * with empty bodies are left out of the messages but still contribute
 * overrides, except a trailing user turn, which is always sent so that the
 * conversation ends on the pending prompt.
 */
export async function buildConversation(turns: Turn[], options: BuildOptions): Promise<Conversation> {
  const messages: ChatMessage[] = [];
  const warnings: string[] = [];
  const effective: Overrides = {};

  const trailing = turns[turns.length - 1];

  for (const turn of turns) {
    const body = turn.rawBody.trim();
    if (turn.role === 'assistant') {
      if (body !== '') messages.push({ role: 'assistant', content: body });
      continue;
    }

    const expansion = await expandPlaceholders(body, options.root);
    warnings.push(...expansion.warnings.map(w => `turn ${turn.ordinal + 1}: ${w}`));
    if (expansion.overrides.level !== undefined) {
      effective.level = expansion.overrides.level;
    }
    if (expansion.overrides.temperature !== undefined) {
      effective.temperature = expansion.overrides.temperature;
    }

    const content = expansion.text.trim();
    if (content !== '' || turn === trailing) messages.push({ role: 'user', content });
  }

  return {
    messages,
    level: effective.level ?? options.defaultLevel,
    temperature: effective.temperature ?? options.defaultTemperature,
    warnings,
  };
}

// Appends extra text to the last user message, returning a new list
export function appendToLastUser(messages: ChatMessage[], extra: string): ChatMessage[] {
  let index = -1;
  messages.forEach((message, i) => {
    if (message.role === 'user') index = i;
  });
  if (index === -1 || extra.trim() === '') {
    return messages;
  }
  return messages.map((message, i) => {
    if (i !== index) return message;
    const content = message.content === '' ? extra.trim() : `${message.content}\n\n${extra.trim()}`;
    return { role: message.role, content };
  });
}

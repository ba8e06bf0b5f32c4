// Cycle.ts
// ========
// One processing cycle: read the document, run the exchange, commit once.

import * as fs from 'fs/promises';
import {
  INITIAL_DOCUMENT,
  commitDocument,
  hasPendingUserTurn,
  parseDocument,
} from './Document';
import { runExchange, type ExchangeOptions, type ExchangeOutcome } from './Exchange';
import { errorCode, errorMessage, logStep } from './Log';
import type { Notification } from './Notify';
import { levelToTokens } from './Placeholders';

export const THINKING_MESSAGE = 'Grok is thinking...';

export interface DocumentStore {
  read(): Promise<string | null>;
  write(text: string): Promise<void>;
}

export interface CycleResult {
  // Set when the cycle finished a model exchange, successfully or not
  notification: Notification | null;
  // The text written to the store, if anything was written
  written: string | null;
  outcome: ExchangeOutcome | null;
}

// A store backed by a UTF-8 file; a missing file reads as null
export function fileStore(file: string): DocumentStore {
  return {
    async read() {
      try {
        return await fs.readFile(file, 'utf8');
      } catch (err) {
        if (errorCode(err) === 'ENOENT') return null;
        throw err;
      }
    },
    async write(text) {
      await fs.writeFile(file, text, 'utf8');
    },
  };
}

function successMessage(outcome: ExchangeOutcome): string {
  const calls = `${outcome.attempts} call${outcome.attempts === 1 ? '' : 's'}`;
  if (outcome.truncated) {
    return `Grok has responded, truncated at ${levelToTokens(outcome.level)} tokens (${calls}).`;
  }
  return `Grok has responded (${calls}).`;
}

/**
 * Runs one cycle against the store. A blank or missing document is
 * initialized with an empty user marker. Otherwise the store is read once
 * and, when the exchange succeeds, written exactly once; a failed exchange
 * leaves it untouched.
 */
export async function runCycle(store: DocumentStore, options: ExchangeOptions): Promise<CycleResult> {
  const text = await store.read();
  if (text === null || text.trim() === '') {
    await store.write(INITIAL_DOCUMENT);
    logStep(`Initialized chat document. Write your prompt under "${INITIAL_DOCUMENT.trim()}".`);
    return { notification: null, written: INITIAL_DOCUMENT, outcome: null };
  }

  const turns = parseDocument(text);
  if (!hasPendingUserTurn(turns)) {
    logStep('No user prompt to process.');
    return { notification: null, written: null, outcome: null };
  }

  logStep(THINKING_MESSAGE);
  let outcome: ExchangeOutcome;
  try {
    outcome = await runExchange(turns, options);
  } catch (err) {
    return {
      notification: { success: false, message: `Grok failed to respond: ${errorMessage(err)}` },
      written: null,
      outcome: null,
    };
  }

  const committed = commitDocument(text, { userBody: outcome.userBody, response: outcome.response });
  await store.write(committed);
  return { notification: { success: true, message: successMessage(outcome) }, written: committed, outcome };
}

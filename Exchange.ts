// Exchange.ts
// ===========
// The retry/chaining loop behind one processing cycle.
//
// States:
//
//   build -> call -> inspect -> done
//                       |-> retry-tokens  -> call
//                       '-> request-files -> call
//
// Two independent bounds keep the loop finite:
// - retry-tokens raises the level by one and stops at MAX_LEVEL
// - request-files only loops when the model names a file not yet supplied
//   in this cycle, and at most MAX_FILE_ROUNDS times
//
// Nothing here writes the document. The caller commits the outcome once.

import { appendToLastUser, buildConversation, type ChatMessage } from './Conversation';
import type { Turn } from './Document';
import { tokenCount, type ChatClient, type ChatReply } from './GenAI';
import { logDetail, logStep, logWarn } from './Log';
import { filterRequestedPaths } from './Paths';
import { MAX_LEVEL, expandPlaceholders, levelToTokens } from './Placeholders';

export const FILE_REQUEST_PREFIX = 'GROK REQUESTS FILES: ';
export const MAX_FILE_ROUNDS = 8;

export const FILE_REQUEST_SYSTEM = [
  'You are talking to the user through a text document that lives inside their project.',
  'If answering well requires project files you have not been shown, reply with exactly one line and nothing else:',
  '',
  `${FILE_REQUEST_PREFIX}path/to/first.ts, path/to/second.ts`,
  '',
  'Paths are relative to the project root. The files will be attached to the last prompt and it will be sent again.',
  'Never request a file you were already given.',
].join('\n');

export type ResponseKind =
  | { kind: 'normal' }
  | { kind: 'truncated' }
  | { kind: 'file-request'; paths: string[] };

type State = 'build' | 'call' | 'inspect' | 'retry-tokens' | 'request-files' | 'done';

export interface ExchangeOptions {
  root: string;
  client: ChatClient;
  defaultLevel: number;
  defaultTemperature: number;
  autoIncreaseTokens: boolean;
  autoFileRequest: boolean;
  timeoutMs: number;
}

export interface ExchangeOutcome {
  // Final text for the response region, warning line included
  response: string;
  // Last user body as it should be committed, requested @f: lines included
  userBody: string;
  attempts: number;
  level: number;
  truncated: boolean;
  requestedFiles: string[];
  warnings: string[];
}

// Classification
// --------------

/**
 * Sorts a reply into normal, truncated or file request. A file request must
 * be the whole body: the prefix and a comma-separated list on one line.
 * Any surrounding prose makes it a normal reply.
 */
export function classifyResponse(reply: ChatReply): ResponseKind {
  if (reply.truncated) {
    return { kind: 'truncated' };
  }
  const body = reply.text.trim();
  if (!body.startsWith(FILE_REQUEST_PREFIX) || /[\r\n]/.test(body)) {
    return { kind: 'normal' };
  }
  const paths = body
    .slice(FILE_REQUEST_PREFIX.length)
    .split(',')
    .map(p => p.trim())
    .filter(p => p !== '');
  return paths.length > 0 ? { kind: 'file-request', paths } : { kind: 'normal' };
}

export function truncationWarning(maxTokens: number): string {
  return `[Warning: response truncated at ${maxTokens} max tokens]`;
}

function promptTokens(messages: ChatMessage[]): number {
  return tokenCount(messages.map(m => m.content).join('\n\n'));
}

// Loop
// ----

/**
 * Runs one cycle's exchange for a document whose last turn is a pending
 * user turn. Transport errors from the client propagate unchanged.
 */
export async function runExchange(turns: Turn[], options: ExchangeOptions): Promise<ExchangeOutcome> {
  const last = turns[turns.length - 1];
  if (!last || last.role !== 'user') {
    throw new Error('runExchange needs a trailing user turn');
  }

  const warnings: string[] = [];
  const appended: string[] = [];
  const system = options.autoFileRequest ? FILE_REQUEST_SYSTEM : undefined;

  let state: State = 'build';
  let messages: ChatMessage[] = [];
  let startLevel = options.defaultLevel;
  let level = startLevel;
  let temperature = options.defaultTemperature;
  let reply: ChatReply = { text: '', truncated: false };
  let verdict: ResponseKind = { kind: 'normal' };
  let requested: string[] = [];
  let attempts = 0;
  let fileRounds = 0;

  while (state !== 'done') {
    switch (state) {
      case 'build': {
        const conversation = await buildConversation(turns, {
          root: options.root,
          defaultLevel: options.defaultLevel,
          defaultTemperature: options.defaultTemperature,
        });
        messages = conversation.messages;
        startLevel = level = conversation.level;
        temperature = conversation.temperature;
        warnings.push(...conversation.warnings);
        conversation.warnings.forEach(logWarn);
        state = 'call';
        break;
      }

      case 'call': {
        attempts += 1;
        const maxTokens = levelToTokens(level);
        logStep(`Call ${attempts}: ${messages.length} message(s), ${promptTokens(messages)} prompt tokens, max_tokens=${maxTokens}, temperature=${temperature}`);
        reply = await options.client.send(messages, {
          maxTokens,
          temperature,
          timeoutMs: options.timeoutMs,
          system,
        });
        state = 'inspect';
        break;
      }

      case 'inspect': {
        verdict = classifyResponse(reply);
        if (verdict.kind === 'truncated') {
          state = options.autoIncreaseTokens && level < MAX_LEVEL ? 'retry-tokens' : 'done';
        } else if (verdict.kind === 'file-request' && options.autoFileRequest) {
          requested = verdict.paths;
          state = 'request-files';
        } else {
          state = 'done';
        }
        break;
      }

      case 'retry-tokens': {
        level += 1;
        logStep(`Response truncated; retrying at L${level} (${levelToTokens(level)} tokens).`);
        state = 'call';
        break;
      }

      case 'request-files': {
        state = 'done';
        if (fileRounds >= MAX_FILE_ROUNDS) {
          logWarn(`File requests stopped after ${MAX_FILE_ROUNDS} rounds.`);
          break;
        }

        const { accepted, rejected } = await filterRequestedPaths(requested, options.root);
        for (const entry of rejected) {
          logDetail(`Dropped requested path ${entry.path}: ${entry.reason}`);
        }
        const fresh = accepted.filter(p => !appended.includes(p));
        if (fresh.length === 0) {
          logStep('File request names nothing new; keeping the reply as is.');
          break;
        }

        const expansion = await expandPlaceholders(fresh.map(p => `@f:${p}`).join('\n'), options.root);
        warnings.push(...expansion.warnings);
        expansion.warnings.forEach(logWarn);
        appended.push(...fresh);
        fileRounds += 1;
        messages = appendToLastUser(messages, expansion.text);
        level = startLevel;
        logStep(`Model requested ${fresh.join(', ')}; sending again.`);
        state = 'call';
        break;
      }
    }
  }

  const truncated = verdict.kind === 'truncated';
  if (truncated) {
    logWarn(`Response truncated at L${level} (${levelToTokens(level)} tokens).`);
  }

  const body = last.rawBody.trim();
  const fileLines = appended.map(p => `@f:${p}`).join('\n');

  return {
    response: truncated ? `${truncationWarning(levelToTokens(level))}\n${reply.text}` : reply.text,
    userBody: fileLines ? `${body}\n\n${fileLines}` : body,
    attempts,
    level,
    truncated,
    requestedFiles: appended,
    warnings,
  };
}

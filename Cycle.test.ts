import { describe, expect, it } from 'vitest';
import type { ChatMessage } from './Conversation';
import { INITIAL_DOCUMENT } from './Document';
import { runCycle, type DocumentStore } from './Cycle';
import type { ExchangeOptions } from './Exchange';
import type { ChatClient, ChatReply, SendOptions } from './GenAI';

class MemoryStore implements DocumentStore {
  text: string | null;
  writes: string[] = [];

  constructor(text: string | null) {
    this.text = text;
  }

  async read(): Promise<string | null> {
    return this.text;
  }

  async write(text: string): Promise<void> {
    this.writes.push(text);
    this.text = text;
  }
}

class QueueClient implements ChatClient {
  calls = 0;
  private readonly replies: (ChatReply | Error)[];

  constructor(replies: (ChatReply | Error)[]) {
    this.replies = [...replies];
  }

  async send(_messages: ChatMessage[], _options: SendOptions): Promise<ChatReply> {
    this.calls += 1;
    const next = this.replies.shift();
    if (next === undefined) throw new Error('no scripted reply left');
    if (next instanceof Error) throw next;
    return next;
  }
}

function options(client: ChatClient): ExchangeOptions {
  return {
    root: process.cwd(),
    client,
    defaultLevel: 3,
    defaultTemperature: 1,
    autoIncreaseTokens: true,
    autoFileRequest: true,
    timeoutMs: 1000,
  };
}

describe('runCycle', () => {
  it('commits the response in a single write', async () => {
    const store = new MemoryStore('USER PROMPT:\nHi there\n');
    const client = new QueueClient([{ text: 'Hello!', truncated: false }]);
    const result = await runCycle(store, options(client));
    expect(store.writes).toEqual(['USER PROMPT:\nHi there\n\nGROK RESPONSE:\nHello!\n\nUSER PROMPT:\n']);
    expect(result.notification).toEqual({ success: true, message: 'Grok has responded (1 call).' });
    expect(result.written).toBe(store.writes[0]);
  });

  it('writes once however many calls the exchange needs', async () => {
    const store = new MemoryStore('USER PROMPT:\nlong answer please\n');
    const client = new QueueClient([
      { text: 'par', truncated: true },
      { text: 'parti', truncated: true },
      { text: 'full answer', truncated: false },
    ]);
    const result = await runCycle(store, options(client));
    expect(client.calls).toBe(3);
    expect(store.writes).toHaveLength(1);
    expect(store.writes[0]).toContain('GROK RESPONSE:\nfull answer\n');
    expect(result.notification).toEqual({ success: true, message: 'Grok has responded (3 calls).' });
  });

  it('reports a reply still truncated at the top level', async () => {
    const store = new MemoryStore('USER PROMPT:\nq @t:L5\n');
    const client = new QueueClient([{ text: 'part', truncated: true }]);
    const result = await runCycle(store, options(client));
    expect(store.writes).toEqual([
      'USER PROMPT:\nq @t:L5\n\nGROK RESPONSE:\n[Warning: response truncated at 16384 max tokens]\npart\n\nUSER PROMPT:\n',
    ]);
    expect(result.notification).toEqual({
      success: true,
      message: 'Grok has responded, truncated at 16384 tokens (1 call).',
    });
  });

  it('leaves the document untouched when the model call fails', async () => {
    const store = new MemoryStore('USER PROMPT:\nq\n');
    const client = new QueueClient([new Error('Request timed out.')]);
    const result = await runCycle(store, options(client));
    expect(store.writes).toEqual([]);
    expect(result).toEqual({
      notification: { success: false, message: 'Grok failed to respond: Request timed out.' },
      written: null,
      outcome: null,
    });
  });

  it('initializes a missing or blank document without calling the model', async () => {
    for (const text of [null, '', '  \n\n']) {
      const store = new MemoryStore(text);
      const client = new QueueClient([]);
      const result = await runCycle(store, options(client));
      expect(store.writes).toEqual([INITIAL_DOCUMENT]);
      expect(result.notification).toBeNull();
      expect(client.calls).toBe(0);
    }
  });

  it('does nothing when no prompt is pending', async () => {
    const committed = 'USER PROMPT:\nq\n\nGROK RESPONSE:\na\n\nUSER PROMPT:\n';
    const store = new MemoryStore(committed);
    const client = new QueueClient([]);
    const result = await runCycle(store, options(client));
    expect(store.writes).toEqual([]);
    expect(result).toEqual({ notification: null, written: null, outcome: null });
    expect(client.calls).toBe(0);
  });
});

import { describe, expect, it } from 'vitest';
import {
  INITIAL_DOCUMENT,
  commitDocument,
  hasPendingUserTurn,
  parseDocument,
} from './Document';

describe('parseDocument', () => {
  it('splits a document into alternating turns', () => {
    const turns = parseDocument('USER PROMPT:\nHi there\n\nGROK RESPONSE:\nHello!\n\nUSER PROMPT:\nHow are you?\n');
    expect(turns.map(t => t.role)).toEqual(['user', 'assistant', 'user']);
    expect(turns.map(t => t.rawBody.trim())).toEqual(['Hi there', 'Hello!', 'How are you?']);
    expect(turns.map(t => t.ordinal)).toEqual([0, 1, 2]);
  });

  it('records where each turn starts', () => {
    const text = 'USER PROMPT:\na\nGROK RESPONSE:\nb\n';
    const turns = parseDocument(text);
    expect(turns[0].offset).toBe(0);
    expect(turns[1].offset).toBe(text.indexOf('GROK RESPONSE:'));
  });

  it('only treats exact marker lines as boundaries', () => {
    const turns = parseDocument('USER PROMPT:\nquote: USER PROMPT: inline\n  GROK RESPONSE:\n');
    expect(turns).toHaveLength(1);
    expect(turns[0].rawBody).toBe('quote: USER PROMPT: inline\n  GROK RESPONSE:');
  });

  it('tolerates trailing blanks and CRLF on marker lines', () => {
    const turns = parseDocument('USER PROMPT:  \r\nfirst\r\nGROK RESPONSE:\r\nsecond\r\n');
    expect(turns.map(t => t.role)).toEqual(['user', 'assistant']);
  });

  it('keeps consecutive turns with the same role', () => {
    const turns = parseDocument('USER PROMPT:\none\nUSER PROMPT:\ntwo\n');
    expect(turns.map(t => [t.role, t.rawBody])).toEqual([['user', 'one'], ['user', 'two']]);
  });

  it('turns text before the first marker into a user turn', () => {
    const turns = parseDocument('loose notes\n\nGROK RESPONSE:\nok\n');
    expect(turns[0]).toEqual({ role: 'user', rawBody: 'loose notes\n', ordinal: 0, offset: 0 });
    expect(turns[1].role).toBe('assistant');
  });

  it('treats a document without markers as one user turn', () => {
    expect(parseDocument('just a question')).toEqual([
      { role: 'user', rawBody: 'just a question', ordinal: 0, offset: 0 },
    ]);
  });

  it('returns no turns for blank text', () => {
    expect(parseDocument('')).toEqual([]);
    expect(parseDocument('\n\n  \n')).toEqual([]);
  });
});

describe('hasPendingUserTurn', () => {
  it('is true when the last turn is a non-empty user turn', () => {
    expect(hasPendingUserTurn(parseDocument('USER PROMPT:\nquestion\n'))).toBe(true);
  });

  it('is false after a response or with an empty trailing prompt', () => {
    expect(hasPendingUserTurn(parseDocument('USER PROMPT:\nq\nGROK RESPONSE:\na\n'))).toBe(false);
    expect(hasPendingUserTurn(parseDocument('USER PROMPT:\nq\nGROK RESPONSE:\na\n\nUSER PROMPT:\n  \n'))).toBe(false);
    expect(hasPendingUserTurn(parseDocument(INITIAL_DOCUMENT))).toBe(false);
    expect(hasPendingUserTurn([])).toBe(false);
  });

  it('only looks at the trailing turn of malformed documents', () => {
    expect(hasPendingUserTurn(parseDocument('GROK RESPONSE:\nx\nGROK RESPONSE:\ny\nUSER PROMPT:\nz\n'))).toBe(true);
  });
});

describe('commitDocument', () => {
  it('rewrites the last user turn and appends the response and a fresh prompt', () => {
    const text = 'USER PROMPT:\nfirst\n\nGROK RESPONSE:\none\n\nUSER PROMPT:\nsecond  \n';
    expect(commitDocument(text, { userBody: 'second', response: 'two\n' })).toBe(
      'USER PROMPT:\nfirst\n\nGROK RESPONSE:\none\n\n'
      + 'USER PROMPT:\nsecond\n\nGROK RESPONSE:\ntwo\n\nUSER PROMPT:\n',
    );
  });

  it('writes appended placeholder lines into the user body', () => {
    const text = 'USER PROMPT:\nExplain the build\n';
    expect(commitDocument(text, { userBody: 'Explain the build\n\n@f:package.json', response: 'Sure.' })).toBe(
      'USER PROMPT:\nExplain the build\n\n@f:package.json\n\nGROK RESPONSE:\nSure.\n\nUSER PROMPT:\n',
    );
  });

  it('keeps the indent of a response that opens with code', () => {
    expect(commitDocument('USER PROMPT:\nq\n', { userBody: 'q', response: '\n\n    indented();\nmore\n\n' })).toBe(
      'USER PROMPT:\nq\n\nGROK RESPONSE:\n    indented();\nmore\n\nUSER PROMPT:\n',
    );
  });

  it('normalizes a marker-less document', () => {
    expect(commitDocument('hello', { userBody: 'hello', response: 'hi' })).toBe(
      'USER PROMPT:\nhello\n\nGROK RESPONSE:\nhi\n\nUSER PROMPT:\n',
    );
  });

  it('ends with an empty user prompt that is not pending', () => {
    const committed = commitDocument('USER PROMPT:\nq\n', { userBody: 'q', response: 'a' });
    const turns = parseDocument(committed);
    expect(turns[turns.length - 1]).toMatchObject({ role: 'user', rawBody: '' });
    expect(hasPendingUserTurn(turns)).toBe(false);
  });
});

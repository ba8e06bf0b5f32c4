import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { expandPlaceholders, levelToTokens, scanPlaceholders } from './Placeholders';

let root: string;

beforeEach(async () => {
  root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'gchat-placeholders-')));
  await fs.writeFile(path.join(root, 'notes.txt'), 'hello', 'utf8');
  await fs.mkdir(path.join(root, 'docs'));
  await fs.writeFile(path.join(root, 'docs', 'a.md'), 'A\n', 'utf8');
  await fs.writeFile(path.join(root, 'docs', 'b.md'), 'B', 'utf8');
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

const NOTES_BLOCK = 'Contents of notes.txt:\n```\nhello\n```\n';

describe('levelToTokens', () => {
  it('doubles from 512 tokens per level', () => {
    expect([0, 1, 2, 3, 4, 5].map(levelToTokens)).toEqual([512, 1024, 2048, 4096, 8192, 16384]);
  });
});

describe('scanPlaceholders', () => {
  it('tags every placeholder in reading order', () => {
    const found = scanPlaceholders('x @f:a @d:b @t:L2 @p:1 @t:bad');
    expect(found.map(p => p.kind)).toEqual(['file', 'tree', 'level', 'temperature', 'invalid']);
    expect(found.map(p => p.raw)).toEqual(['@f:a', '@d:b', '@t:L2', '@p:1', '@t:bad']);
  });

  it('ignores tags glued to a preceding word', () => {
    expect(scanPlaceholders('mail me@f:x')).toEqual([]);
  });
});

describe('expandPlaceholders', () => {
  it('leaves text without placeholders unchanged', async () => {
    for (const text of ['', 'plain prose', 'mail me@f:x', 'costs @ 5:00', '@x:foo', '  spaced  \n']) {
      expect(await expandPlaceholders(text, root)).toEqual({ text, overrides: {}, warnings: [] });
    }
  });

  it('inlines a file', async () => {
    expect((await expandPlaceholders('@f:notes.txt', root)).text).toBe(NOTES_BLOCK);
    expect((await expandPlaceholders('@f :notes.txt', root)).text).toBe(NOTES_BLOCK);
  });

  it('extracts a level and removes it from the text', async () => {
    const result = await expandPlaceholders('Summarize @f:notes.txt @t:L1', root);
    expect(result.text).toBe(`Summarize ${NOTES_BLOCK}`);
    expect(result.overrides).toEqual({ level: 1 });
    expect(result.warnings).toEqual([]);
  });

  it('concatenates glob matches in sorted order', async () => {
    const result = await expandPlaceholders('See @f:docs/*.md', root);
    expect(result.text).toBe('See Contents of docs/a.md:\n```\nA\n```\n\nContents of docs/b.md:\n```\nB\n```\n');
  });

  it('inlines a directory tree', async () => {
    const result = await expandPlaceholders('@d:docs', root);
    expect(result.text).toBe('Directory tree of docs:\n```\ndocs/\n  a.md\n  b.md\n```\n');
  });

  it('keeps failed path placeholders verbatim and expands the others', async () => {
    const result = await expandPlaceholders('Read @f:missing.txt and @f:notes.txt', root);
    expect(result.text).toBe(`Read @f:missing.txt and ${NOTES_BLOCK}`);
    expect(result.warnings).toEqual(['Failed to expand @f:missing.txt: missing.txt: no such file or directory']);
  });

  it('refuses paths outside the root', async () => {
    const result = await expandPlaceholders('@f:../secret.txt', root);
    expect(result.text).toBe('@f:../secret.txt');
    expect(result.warnings).toEqual(['Failed to expand @f:../secret.txt: ../secret.txt: parent traversal is not allowed']);
  });

  it('clamps levels above 5', async () => {
    const result = await expandPlaceholders('Go @t:L9', root);
    expect(result).toEqual({ text: 'Go', overrides: { level: 5 }, warnings: ['@t:L9 is above L5; using L5'] });
  });

  it('leaves malformed overrides in place', async () => {
    expect(await expandPlaceholders('Go @t:high', root)).toEqual({
      text: 'Go @t:high',
      overrides: {},
      warnings: ['Ignoring @t:high: expected L0 to L5, got "high"'],
    });
    expect(await expandPlaceholders('@p:warm', root)).toEqual({
      text: '@p:warm',
      overrides: {},
      warnings: ['Ignoring @p:warm: expected a number, got "warm"'],
    });
  });

  it('extracts temperatures and clamps them to 0..2', async () => {
    expect(await expandPlaceholders('@p:0.3 Be brief', root)).toEqual({
      text: 'Be brief',
      overrides: { temperature: 0.3 },
      warnings: [],
    });
    expect((await expandPlaceholders('@p:3', root)).overrides).toEqual({ temperature: 2 });
  });

  it('lets the last override of each kind win within a turn', async () => {
    const result = await expandPlaceholders('a @t:L1 b @t:L4 @p:0.5 @p:0.9', root);
    expect(result.text).toBe('a b');
    expect(result.overrides).toEqual({ level: 4, temperature: 0.9 });
  });

  it('drops the gap left by an override between words', async () => {
    expect((await expandPlaceholders('Fix this @t:L2 please', root)).text).toBe('Fix this please');
  });
});

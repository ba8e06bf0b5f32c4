// Placeholders.ts
// ===============
// Expands the placeholders a user can write inside a prompt:
//
//   @f:<path-expr>   contents of a file, glob or directory
//   @d:<path-expr>   nested listing of a directory
//   @t:L<n>          max-tokens level for this turn (512 * 2^n tokens)
//   @p:<float>       temperature for this turn
//
// A single space is allowed between the tag and the colon ("@f :x").
// Placeholders start at the beginning of the text or after whitespace.
// Failed expansions stay verbatim in the output so the user sees them
// in place; the cycle continues with a warning.

import * as fs from 'fs/promises';
import { errorMessage } from './Log';
import { renderTree, resolvePaths } from './Paths';

export const MAX_LEVEL = 5;
export const MIN_TEMPERATURE = 0;
export const MAX_TEMPERATURE = 2;

const PLACEHOLDER = /(?<!\S)@([fdtp]) ?:(\S+)/g;
const LEVEL = /^L(\d+)$/;
const FLOAT = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

interface Span {
  raw: string;
  start: number;
  end: number;
}

export type Placeholder = Span & (
  | { kind: 'file'; expr: string }
  | { kind: 'tree'; expr: string }
  | { kind: 'level'; level: number; requested: number }
  | { kind: 'temperature'; value: number; requested: number }
  | { kind: 'invalid'; reason: string }
);

export interface Overrides {
  level?: number;
  temperature?: number;
}

export interface ExpansionResult {
  text: string;
  overrides: Overrides;
  warnings: string[];
}

// Token levels
// ------------

export function levelToTokens(level: number): number {
  return 512 * 2 ** level;
}

// Scanning
// --------

function parseLevel(span: Span, arg: string): Placeholder {
  const match = LEVEL.exec(arg);
  if (!match) {
    return { ...span, kind: 'invalid', reason: `expected L0 to L${MAX_LEVEL}, got "${arg}"` };
  }
  const requested = Number(match[1]);
  return { ...span, kind: 'level', requested, level: Math.min(requested, MAX_LEVEL) };
}

function parseTemperature(span: Span, arg: string): Placeholder {
  if (!FLOAT.test(arg)) {
    return { ...span, kind: 'invalid', reason: `expected a number, got "${arg}"` };
  }
  const requested = Number(arg);
  const value = Math.min(Math.max(requested, MIN_TEMPERATURE), MAX_TEMPERATURE);
  return { ...span, kind: 'temperature', requested, value };
}

/**
 * Finds every placeholder in reading order. One pass, no I/O: path
 * placeholders are resolved later by `expandPlaceholders`.
 */
export function scanPlaceholders(text: string): Placeholder[] {
  const found: Placeholder[] = [];
  for (const match of text.matchAll(PLACEHOLDER)) {
    const start = match.index ?? 0;
    const [raw, tag, arg] = match;
    const span: Span = { raw, start, end: start + raw.length };
    switch (tag) {
      case 'f': found.push({ ...span, kind: 'file', expr: arg }); break;
      case 'd': found.push({ ...span, kind: 'tree', expr: arg }); break;
      case 't': found.push(parseLevel(span, arg)); break;
      case 'p': found.push(parseTemperature(span, arg)); break;
    }
  }
  return found;
}

// Expansion
// ---------

// Formats one included file
export function fileBlock(label: string, content: string): string {
  return `Contents of ${label}:\n\`\`\`\n${content.replace(/\r?\n$/, '')}\n\`\`\`\n`;
}

async function renderFiles(expr: string, root: string): Promise<string> {
  const blocks: string[] = [];
  for (const file of await resolvePaths(expr, root)) {
    blocks.push(fileBlock(file.relative, await fs.readFile(file.absolute, 'utf8')));
  }
  return blocks.join('\n');
}

// Drops the blanks left behind by a removed override
function removeOverride(out: string, text: string, end: number): { out: string; next: number } {
  const trimmed = out.replace(/[ \t]+$/, '');
  if (trimmed !== '' && !trimmed.endsWith('\n')) {
    return { out: trimmed, next: end };
  }
  const rest = text.slice(end);
  return { out: trimmed, next: end + (rest.length - rest.replace(/^[ \t]+/, '').length) };
}

/**
 * Replaces path placeholders with their contents and extracts overrides.
 * Within one text, the last override of each kind wins.
 */
export async function expandPlaceholders(text: string, root: string): Promise<ExpansionResult> {
  const overrides: Overrides = {};
  const warnings: string[] = [];
  let out = '';
  let last = 0;

  for (const ph of scanPlaceholders(text)) {
    out += text.slice(last, ph.start);
    last = ph.end;

    switch (ph.kind) {
      case 'file':
      case 'tree': {
        try {
          out += ph.kind === 'file'
            ? await renderFiles(ph.expr, root)
            : await renderTree(ph.expr, root);
        } catch (err) {
          warnings.push(`Failed to expand ${ph.raw}: ${errorMessage(err)}`);
          out += ph.raw;
        }
        break;
      }
      case 'level': {
        if (ph.requested !== ph.level) {
          warnings.push(`${ph.raw} is above L${MAX_LEVEL}; using L${ph.level}`);
        }
        overrides.level = ph.level;
        ({ out, next: last } = removeOverride(out, text, ph.end));
        break;
      }
      case 'temperature': {
        if (ph.requested !== ph.value) {
          warnings.push(`${ph.raw} is outside ${MIN_TEMPERATURE}..${MAX_TEMPERATURE}; using ${ph.value}`);
        }
        overrides.temperature = ph.value;
        ({ out, next: last } = removeOverride(out, text, ph.end));
        break;
      }
      case 'invalid': {
        warnings.push(`Ignoring ${ph.raw}: ${ph.reason}`);
        out += ph.raw;
        break;
      }
    }
  }

  out += text.slice(last);
  return { text: out, overrides, warnings };
}

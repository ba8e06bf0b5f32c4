// Document.ts
// ===========
// Turn-structured chat documents.
//
// A document is a sequence of regions, each opened by a marker line:
//
//   USER PROMPT:
//   ... what the user wrote ...
//
//   GROK RESPONSE:
//   ... what the model replied ...
//
//   USER PROMPT:
//
// Turns are re-derived from the text on every cycle and never edited in
// place. The only write path is `commitDocument`, which re-serializes the
// tail of the document starting at the last user turn.

export const USER_MARKER     = 'USER PROMPT:';
export const RESPONSE_MARKER = 'GROK RESPONSE:';

export const INITIAL_DOCUMENT = `${USER_MARKER}\n`;

export type Role = 'user' | 'assistant';

export interface Turn {
  role: Role;
  rawBody: string;
  ordinal: number;
  // Character index where the turn's region begins (its marker line)
  offset: number;
}

export interface CommitRegion {
  userBody: string;
  response: string;
}

// Parsing
// -------

// Matches a line against the two markers, tolerating trailing blanks and CR
function markerRole(line: string): Role | null {
  const stripped = line.replace(/\s+$/, '');
  if (stripped === USER_MARKER) return 'user';
  if (stripped === RESPONSE_MARKER) return 'assistant';
  return null;
}

// Splits text into lines while keeping each line's start index
function splitLines(text: string): { line: string; start: number }[] {
  const lines: { line: string; start: number }[] = [];
  let start = 0;
  while (start <= text.length) {
    const end = text.indexOf('\n', start);
    if (end === -1) {
      if (start < text.length) {
        lines.push({ line: text.slice(start), start });
      }
      break;
    }
    lines.push({ line: text.slice(start, end), start });
    start = end + 1;
  }
  return lines;
}

/**
 * Parses a document into its ordered turns.
 *
 * Never throws: text before the first marker becomes a leading user turn
 * when it is not blank, and a marker with nothing after it yields an empty
 * body. Consecutive turns with the same role are kept as they are.
 */
export function parseDocument(text: string): Turn[] {
  const turns: Turn[] = [];
  let role: Role = 'user';
  let offset = 0;
  let body: string[] = [];
  let opened = false;

  const close = () => {
    const rawBody = body.join('\n');
    if (opened || rawBody.trim() !== '') {
      turns.push({ role, rawBody, ordinal: turns.length, offset });
    }
  };

  for (const { line, start } of splitLines(text)) {
    const next = markerRole(line);
    if (next === null) {
      body.push(line);
      continue;
    }
    close();
    role = next;
    offset = start;
    body = [];
    opened = true;
  }
  close();

  return turns;
}

// Tells whether the document ends with a user turn that has something to send
export function hasPendingUserTurn(turns: Turn[]): boolean {
  const last = turns[turns.length - 1];
  return last !== undefined && last.role === 'user' && last.rawBody.trim() !== '';
}

// Serialization
// -------------

// Drops blank lines around text, keeping the indent of its first line
function trimBlankLines(text: string): string {
  return text.replace(/^\s*\n|\s+$/g, '');
}

// Renders the region written at the end of a cycle
export function renderRegion(region: CommitRegion): string {
  return [
    USER_MARKER,
    region.userBody.trim(),
    '',
    RESPONSE_MARKER,
    trimBlankLines(region.response),
    '',
    USER_MARKER,
    '',
  ].join('\n');
}

/**
 * Replaces everything from the start of the last user turn to the end of
 * the document with the committed region. Without any user turn, the
 * region is appended.
 */
export function commitDocument(text: string, region: CommitRegion): string {
  const turns = parseDocument(text);
  let cut = -1;
  for (const turn of turns) {
    if (turn.role === 'user') cut = turn.offset;
  }
  if (cut === -1) {
    const head = text.length === 0 || text.endsWith('\n\n') ? text
               : text.endsWith('\n') ? `${text}\n`
               : `${text}\n\n`;
    return head + renderRegion(region);
  }
  return text.slice(0, cut) + renderRegion(region);
}

// Paths.ts
// ========
// Resolves path expressions (literal files, globs, directories) against the
// project root. Every path that reaches the filesystem goes through here.
//
// Containment rules:
// - absolute expressions are rejected
// - expressions whose first segment is ".." are rejected
// - the normalized path must stay lexically under the root
// - the realpath of every matched file must stay physically under the root
//
// A `.gchatignore` file at the root (gitignore syntax) hides entries from
// directory walks, glob matches and trees. Literal file paths are never
// filtered by it.

import * as fs from 'fs/promises';
import * as path from 'path';
import ignore, { type Ignore } from 'ignore';
import { minimatch } from 'minimatch';
import { errorCode, errorMessage } from './Log';

export const IGNORE_FILE = '.gchatignore';

const GLOB_CHARS = /[*?[\]{}]/;

export type PathErrorKind = 'security' | 'not-found' | 'invalid';

export class PathError extends Error {
  readonly kind: PathErrorKind;

  constructor(kind: PathErrorKind, message: string) {
    super(message);
    this.name = 'PathError';
    this.kind = kind;
  }
}

export interface ResolvedFile {
  absolute: string;
  relative: string;
}

export interface RequestedPaths {
  accepted: string[];
  rejected: { path: string; reason: string }[];
}

interface Entry {
  name: string;
  full: string;
  relative: string;
  kind: 'file' | 'dir';
  real: string;
}

// Helpers
// -------

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

function isInside(root: string, target: string): boolean {
  const rel = path.relative(root, target);
  if (rel === '') return true;
  if (rel === '..' || rel.startsWith(`..${path.sep}`)) return false;
  return !path.isAbsolute(rel);
}

function isGlob(expr: string): boolean {
  return GLOB_CHARS.test(expr);
}

// Strips a leading "./" and normalizes separators
export function normalizeExpression(expr: string): string {
  let out = toPosix(expr.trim());
  while (out.startsWith('./')) {
    out = out.slice(2);
  }
  return out === '' ? '.' : out;
}

// Rejects absolute, parent-relative and escaping expressions before any I/O
function checkExpression(expr: string, root: string): void {
  if (expr.trim() === '') {
    throw new PathError('invalid', 'empty path');
  }
  if (path.isAbsolute(expr) || /^[A-Za-z]:[\\/]/.test(expr) || expr.startsWith('\\')) {
    throw new PathError('security', `${expr}: absolute paths are not allowed`);
  }
  const first = expr.split(/[\\/]+/)[0];
  if (first === '..') {
    throw new PathError('security', `${expr}: parent traversal is not allowed`);
  }
  if (!isInside(root, path.resolve(root, expr))) {
    throw new PathError('security', `${expr}: path escapes the project root`);
  }
}

function ensurePhysicallyInside(root: string, real: string, label: string): void {
  if (!isInside(root, real)) {
    throw new PathError('security', `${label}: resolves outside the project root`);
  }
}

async function realpathOf(target: string, label: string): Promise<string> {
  try {
    return await fs.realpath(target);
  } catch (err) {
    const code = errorCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new PathError('not-found', `${label}: no such file or directory`);
    }
    throw err;
  }
}

export async function canonicalRoot(root: string): Promise<string> {
  return fs.realpath(path.resolve(root));
}

async function loadIgnore(root: string): Promise<Ignore> {
  const ig = ignore();
  try {
    ig.add(await fs.readFile(path.join(root, IGNORE_FILE), 'utf8'));
  } catch (err) {
    if (errorCode(err) !== 'ENOENT') throw err;
  }
  return ig;
}

// Walking
// -------

// Lists a directory's visible entries, sorted by name, following symlinks
// only when they stay under the root
async function readEntries(dir: string, root: string, ig: Ignore): Promise<Entry[]> {
  const dirents = await fs.readdir(dir, { withFileTypes: true });
  const entries: Entry[] = [];
  for (const dirent of dirents) {
    const full = path.join(dir, dirent.name);
    const relative = toPosix(path.relative(root, full));
    let kind: Entry['kind'] | null = dirent.isDirectory() ? 'dir' : dirent.isFile() ? 'file' : null;
    let real = full;
    if (dirent.isSymbolicLink()) {
      try {
        real = await fs.realpath(full);
      } catch (err) {
        // Dangling link
        if (errorCode(err) === 'ENOENT') continue;
        throw err;
      }
      ensurePhysicallyInside(root, real, relative);
      const stat = await fs.stat(real);
      kind = stat.isDirectory() ? 'dir' : stat.isFile() ? 'file' : null;
    }
    if (kind === null) continue;
    if (ig.ignores(kind === 'dir' ? `${relative}/` : relative)) continue;
    entries.push({ name: dirent.name, full, relative, kind, real });
  }
  return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

async function walkFiles(
  dir: string,
  root: string,
  ig: Ignore,
  visited: Set<string>,
): Promise<ResolvedFile[]> {
  const files: ResolvedFile[] = [];
  for (const entry of await readEntries(dir, root, ig)) {
    if (entry.kind === 'file') {
      files.push({ absolute: entry.full, relative: entry.relative });
    } else if (!visited.has(entry.real)) {
      visited.add(entry.real);
      files.push(...await walkFiles(entry.full, root, ig, visited));
    }
  }
  return files;
}

// Literal base directory of a glob: every segment before the first wildcard
function globBase(pattern: string): string {
  const segments = pattern.split('/');
  const base: string[] = [];
  for (const segment of segments) {
    if (isGlob(segment)) break;
    base.push(segment);
  }
  return base.join('/') || '.';
}

async function expandGlob(expr: string, root: string, ig: Ignore): Promise<ResolvedFile[]> {
  const pattern = path.posix.normalize(normalizeExpression(expr));
  const base = globBase(pattern);
  const baseDir = path.resolve(root, base);
  let real: string;
  try {
    real = await realpathOf(baseDir, expr);
  } catch (err) {
    if (err instanceof PathError && err.kind === 'not-found') {
      throw new PathError('not-found', `${expr}: no files matched the glob pattern`);
    }
    throw err;
  }
  ensurePhysicallyInside(root, real, expr);
  const candidates = await walkFiles(baseDir, root, ig, new Set([real]));
  const matched = candidates.filter(file => minimatch(file.relative, pattern));
  if (matched.length === 0) {
    throw new PathError('not-found', `${expr}: no files matched the glob pattern`);
  }
  return matched;
}

function sortUnique(files: ResolvedFile[]): ResolvedFile[] {
  const seen = new Map<string, ResolvedFile>();
  for (const file of files) {
    if (!seen.has(file.relative)) seen.set(file.relative, file);
  }
  return [...seen.values()].sort((a, b) =>
    a.relative < b.relative ? -1 : a.relative > b.relative ? 1 : 0,
  );
}

// Resolution
// ----------

/**
 * Resolves a literal path, glob or directory to the files it names.
 *
 * Results are sorted by their root-relative POSIX path. Any containment
 * violation fails the whole expression with a `security` PathError.
 */
export async function resolvePaths(expr: string, root: string): Promise<ResolvedFile[]> {
  const rootReal = await canonicalRoot(root);
  checkExpression(expr, rootReal);
  const ig = await loadIgnore(rootReal);

  if (isGlob(expr)) {
    return sortUnique(await expandGlob(expr, rootReal, ig));
  }

  const target = path.resolve(rootReal, expr);
  const real = await realpathOf(target, expr);
  ensurePhysicallyInside(rootReal, real, expr);

  const stat = await fs.stat(real);
  if (stat.isDirectory()) {
    const files = await walkFiles(target, rootReal, ig, new Set([real]));
    if (files.length === 0) {
      throw new PathError('not-found', `${expr}: no files found in directory`);
    }
    return sortUnique(files);
  }
  if (!stat.isFile()) {
    throw new PathError('invalid', `${expr}: not a regular file`);
  }
  return [{ absolute: target, relative: toPosix(path.relative(rootReal, target)) }];
}

/**
 * Renders a nested listing of a directory:
 *
 *   Directory tree of src:
 *   ```
 *   src/
 *     lib/
 *       util.ts
 *     main.ts
 *   ```
 */
export async function renderTree(expr: string, root: string): Promise<string> {
  const rootReal = await canonicalRoot(root);
  checkExpression(expr, rootReal);
  const ig = await loadIgnore(rootReal);

  const target = path.resolve(rootReal, expr);
  const real = await realpathOf(target, expr);
  ensurePhysicallyInside(rootReal, real, expr);
  if (!(await fs.stat(real)).isDirectory()) {
    throw new PathError('invalid', `${expr}: not a directory`);
  }

  const label = toPosix(path.relative(rootReal, target)) || '.';
  const lines = [`${label}/`];
  const visited = new Set([real]);

  const visit = async (dir: string, depth: number): Promise<void> => {
    for (const entry of await readEntries(dir, rootReal, ig)) {
      const indent = '  '.repeat(depth);
      if (entry.kind === 'file') {
        lines.push(`${indent}${entry.name}`);
        continue;
      }
      lines.push(`${indent}${entry.name}/`);
      if (!visited.has(entry.real)) {
        visited.add(entry.real);
        await visit(entry.full, depth + 1);
      }
    }
  };
  await visit(target, 1);

  if (lines.length === 1) {
    lines.push('  (empty directory)');
  }
  return `Directory tree of ${label}:\n\`\`\`\n${lines.join('\n')}\n\`\`\`\n`;
}

/**
 * Validates paths the model asked for. Each entry is resolved on its own;
 * entries that fail for any reason are dropped, never fatal.
 */
export async function filterRequestedPaths(paths: string[], root: string): Promise<RequestedPaths> {
  const accepted: string[] = [];
  const rejected: RequestedPaths['rejected'] = [];
  for (const raw of paths) {
    const trimmed = raw.trim();
    if (trimmed === '') continue;
    try {
      const normalized = normalizeExpression(trimmed);
      // Accepted paths are written back as "@f:<path>" placeholders
      if (/\s/.test(normalized)) {
        throw new PathError('invalid', `${trimmed}: paths with whitespace cannot be attached`);
      }
      await resolvePaths(normalized, root);
      if (!accepted.includes(normalized)) accepted.push(normalized);
    } catch (err) {
      rejected.push({ path: trimmed, reason: errorMessage(err) });
    }
  }
  return { accepted, rejected };
}

// Config.ts
// =========
// Command-line configuration for gchat.

import * as path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { DEFAULT_MODEL } from './GenAI';
import { MAX_LEVEL, MAX_TEMPERATURE, MIN_TEMPERATURE, levelToTokens } from './Placeholders';

export interface GChatConfig {
  chatFile: string;
  model: string;
  root: string;
  defaultLevel: number;
  defaultTemperature: number;
  timeoutMs: number;
  autoIncreaseTokens: boolean;
  autoFileRequest: boolean;
  bell: boolean;
  once: boolean;
}

export const DEFAULT_CHAT_FILE   = './gchat.md';
export const DEFAULT_LEVEL       = 3;
export const DEFAULT_TEMPERATURE = 1.0;
export const DEFAULT_TIMEOUT_S   = 600;

// Option parsers
// --------------

export function parseLevel(value: string): number {
  const digits = value.trim().replace(/^L/i, '');
  const level = Number(digits);
  if (digits === '' || !Number.isInteger(level) || level < 0 || level > MAX_LEVEL) {
    throw new InvalidArgumentError(`Expected a level from 0 to ${MAX_LEVEL}.`);
  }
  return level;
}

export function parseTemperature(value: string): number {
  const temperature = Number(value);
  if (value.trim() === '' || !Number.isFinite(temperature)
      || temperature < MIN_TEMPERATURE || temperature > MAX_TEMPERATURE) {
    throw new InvalidArgumentError(`Expected a number from ${MIN_TEMPERATURE} to ${MAX_TEMPERATURE}.`);
  }
  return temperature;
}

export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('Expected a positive number of seconds.');
  }
  return seconds;
}

// CLI
// ---

export function buildProgram(): Command {
  return new Command()
    .name('gchat')
    .description('Chat with a language model by editing a text document.')
    .option('-f, --chat-file <path>', 'Chat document to watch', DEFAULT_CHAT_FILE)
    .option('-m, --model <spec>', 'Model spec (vendor:model or alias)', DEFAULT_MODEL)
    .option('-l, --level <0-5>', `Default max-tokens level (tokens = 512 * 2^level)`, parseLevel, DEFAULT_LEVEL)
    .option('-p, --temperature <float>', 'Default temperature', parseTemperature, DEFAULT_TEMPERATURE)
    .option('-T, --api-timeout <seconds>', 'API timeout per call', parseSeconds, DEFAULT_TIMEOUT_S)
    .option('-r, --root <dir>', 'Project root for @f/@d placeholders (default: current directory)')
    .option('--no-auto-tokens', 'Do not retry truncated replies at a higher level')
    .option('--no-file-requests', 'Do not answer model requests for project files')
    .option('--no-bell', 'Do not ring the terminal bell when a cycle ends')
    .option('--once', 'Process the document once and exit instead of watching')
    .addHelpText('after', [
      '',
      'Placeholders (inside USER PROMPT sections):',
      '  @f:<path|glob|dir>   include file contents',
      '  @d:<dir>             include a directory tree',
      `  @t:L<0-${MAX_LEVEL}>            max tokens for this and later turns (L0=${levelToTokens(0)}, L${MAX_LEVEL}=${levelToTokens(MAX_LEVEL)})`,
      '  @p:<float>           temperature for this and later turns',
    ].join('\n'));
}

function optionValue<T>(raw: Record<string, unknown>, key: string, check: (v: unknown) => v is T, fallback: T): T {
  const value = raw[key];
  return check(value) ? value : fallback;
}

const isString = (v: unknown): v is string => typeof v === 'string';
const isNumber = (v: unknown): v is number => typeof v === 'number';
const isBoolean = (v: unknown): v is boolean => typeof v === 'boolean';

/**
 * Parses argv into a validated config. Relative paths are resolved
 * against `cwd`.
 */
export function parseConfig(argv: string[], cwd: string = process.cwd()): GChatConfig {
  const program = buildProgram();
  program.parse(argv);
  const raw: Record<string, unknown> = program.opts();

  const seconds = optionValue(raw, 'apiTimeout', isNumber, DEFAULT_TIMEOUT_S);
  return {
    chatFile: path.resolve(cwd, optionValue(raw, 'chatFile', isString, DEFAULT_CHAT_FILE)),
    model: optionValue(raw, 'model', isString, DEFAULT_MODEL),
    root: path.resolve(cwd, optionValue(raw, 'root', isString, '.')),
    defaultLevel: optionValue(raw, 'level', isNumber, DEFAULT_LEVEL),
    defaultTemperature: optionValue(raw, 'temperature', isNumber, DEFAULT_TEMPERATURE),
    timeoutMs: Math.round(seconds * 1000),
    autoIncreaseTokens: optionValue(raw, 'autoTokens', isBoolean, true),
    autoFileRequest: optionValue(raw, 'fileRequests', isBoolean, true),
    bell: optionValue(raw, 'bell', isBoolean, true),
    once: optionValue(raw, 'once', isBoolean, false),
  };
}

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { countTokens } from 'gpt-tokenizer/model/gpt-4o';
import type { ChatMessage } from './Conversation';
import { errorCode } from './Log';
import { OpenAIChat } from './Vendors/OpenAI';

export const MODELS: Record<string, string> = {
  // xAI Grok
  'x-' : 'xai:grok-3-mini',
  'x'  : 'xai:grok-4-0709',
  'X'  : 'xai:grok-4-0709',

  // OpenAI
  'g-' : 'openai:gpt-4.1-mini',
  'g'  : 'openai:gpt-4.1',
};

export const DEFAULT_MODEL = 'xai:grok-4-0709';

export type Vendor = 'xai' | 'openai' | 'openrouter';

export interface ResolvedModelSpec {
  vendor: Vendor;
  model: string;
}

export interface SendOptions {
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  system?: string;
}

export interface ChatReply {
  text: string;
  truncated: boolean;
}

// The one call the exchange loop makes to a model
export interface ChatClient {
  send(messages: ChatMessage[], options: SendOptions): Promise<ChatReply>;
}

const BASE_URLS: Record<Vendor, string> = {
  xai        : 'https://api.x.ai/v1',
  openai     : 'https://api.openai.com/v1',
  openrouter : 'https://openrouter.ai/api/v1',
};

const KEY_VARS: Record<Vendor, string> = {
  xai        : 'XAI_API_KEY',
  openai     : 'OPENAI_API_KEY',
  openrouter : 'OPENROUTER_API_KEY',
};

function isVendor(value: string): value is Vendor {
  return Object.hasOwn(BASE_URLS, value);
}

function inferVendor(model: string): Vendor {
  const normalized = model.toLowerCase();
  if (normalized.includes('/')) {
    return 'openrouter';
  }
  if (normalized.startsWith('grok')) {
    return 'xai';
  }
  if (normalized.startsWith('gpt') || normalized.startsWith('o')) {
    return 'openai';
  }
  throw new Error(`Unsupported vendor for model "${model}"`);
}

// Reads the vendor's API key from the environment, then ~/.config/<vendor>.token
export async function getToken(vendor: Vendor): Promise<string> {
  const fromEnv = process.env[KEY_VARS[vendor]]?.trim();
  if (fromEnv) {
    return fromEnv;
  }
  const tokenPath = path.join(os.homedir(), '.config', `${vendor}.token`);
  try {
    return (await fs.readFile(tokenPath, 'utf8')).trim();
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      throw new Error(`No API key for ${vendor}: set ${KEY_VARS[vendor]} or write ${tokenPath}`);
    }
    throw err;
  }
}

/**
 * Resolves "vendor:model", a bare model name or a short alias from MODELS.
 * Only the first colon separates the vendor, so OpenRouter ids such as
 * "openrouter:meta-llama/llama-3-70b:free" keep theirs.
 */
export function resolveModelSpec(spec: string): ResolvedModelSpec {
  const trimmed = spec.trim();
  if (!trimmed) {
    throw new Error('Model spec must be provided');
  }

  if (Object.hasOwn(MODELS, trimmed)) {
    return resolveModelSpec(MODELS[trimmed]);
  }

  const colon = trimmed.indexOf(':');
  if (colon === -1) {
    return { vendor: inferVendor(trimmed), model: trimmed };
  }

  const vendorRaw = trimmed.slice(0, colon).trim().toLowerCase();
  const model = trimmed.slice(colon + 1).trim();
  if (!isVendor(vendorRaw)) {
    throw new Error(`Unsupported vendor: ${vendorRaw}`);
  }
  if (!model) {
    throw new Error('Model name must be provided after vendor');
  }
  return { vendor: vendorRaw, model };
}

export async function GenAI(modelSpec: string): Promise<ChatClient> {
  const resolved = resolveModelSpec(modelSpec);
  const apiKey = await getToken(resolved.vendor);
  return new OpenAIChat(apiKey, BASE_URLS[resolved.vendor], resolved.model, resolved.vendor);
}

export function tokenCount(text: string): number {
  return countTokens(text);
}

import OpenAI from "openai";
import type { ChatMessage } from "../Conversation";
import type { ChatClient, ChatReply, SendOptions, Vendor } from "../GenAI";

// The part of a chat completion the reply mapping reads
export interface CompletionLike {
  choices: {
    finish_reason: string | null;
    message: { content: string | null };
  }[];
}

export function toChatReply(completion: CompletionLike): ChatReply {
  const choice = completion.choices[0];
  if (!choice) {
    throw new Error("Model returned no choices");
  }
  return {
    text: choice.message.content ?? "",
    truncated: choice.finish_reason === "length",
  };
}

export function toChatParams(system: string | undefined, messages: ChatMessage[]) {
  return [
    ...(system ? [{ role: "system" as const, content: system }] : []),
    ...messages.map((m) =>
      m.role === "user"
        ? { role: "user" as const, content: m.content }
        : { role: "assistant" as const, content: m.content },
    ),
  ];
}

// Chat-completions client for OpenAI-compatible endpoints (xAI, OpenAI, OpenRouter)
export class OpenAIChat implements ChatClient {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(apiKey: string, baseURL: string, model: string, vendor: Vendor) {
    const defaultHeaders =
      vendor === "openrouter"
        ? { "X-Title": "gchat" }
        : undefined;

    // Retries belong to the exchange loop, never to the transport
    this.client = new OpenAI({ apiKey, baseURL, defaultHeaders, maxRetries: 0 });
    this.model = model;
  }

  async send(messages: ChatMessage[], options: SendOptions): Promise<ChatReply> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: toChatParams(options.system, messages),
        max_tokens: options.maxTokens,
        temperature: options.temperature,
      },
      { timeout: options.timeoutMs, maxRetries: 0 },
    );
    return toChatReply(completion);
  }
}

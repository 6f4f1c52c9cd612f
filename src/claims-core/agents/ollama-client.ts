import { z } from 'zod';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
  /** Base64-encoded images, for multimodal models. */
  images?: string[];
}

const chatResponseSchema = z.object({
  message: z.object({
    role: z.string(),
    content: z.string(),
  }),
});

/**
 * Thin client for a local Ollama server's `/api/chat` endpoint.
 */
export class OllamaClient {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async chat(model: string, messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
    const response = await this.fetchImpl(`${this.baseUrl.replace(/\/+$/, '')}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model, messages, stream: false, format: 'json' }),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Ollama API error: ${response.status} - ${error}`);
    }

    const parsed = chatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected Ollama response: ${parsed.error.message}`);
    }
    return parsed.data.message.content;
  }
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pull the first JSON object out of a model reply, tolerating prose or
 * markdown fences around it. Returns undefined when nothing parses.
 */
export function extractJsonObject(text: string): unknown {
  const trimmed = text.trim();
  const direct = tryParseJson(trimmed);
  if (direct !== undefined) return direct;

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start === -1 || end <= start) return undefined;

  return tryParseJson(trimmed.slice(start, end + 1));
}

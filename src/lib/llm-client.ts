/**
 * Summarization client for OpenAI-compatible chat completion endpoints
 * (OpenAI, OpenRouter, Ollama, LM Studio, ...).
 *
 * One request per call, bounded by a timeout. Retries are the caller's
 * business; this client only reports failure.
 */

export interface SummarizationClient {
  summarize(prompt: string): Promise<string>;
}

export interface ChatClientOptions {
  /** Full chat completions URL, e.g. https://api.openai.com/v1/chat/completions */
  apiUrl: string;
  apiKey?: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

function field(value: unknown, key: string): unknown {
  return value !== null && typeof value === 'object' && key in value
    ? Reflect.get(value, key)
    : undefined;
}

/**
 * Content of the first choice, or the provider's error message.
 */
export function parseChatResponse(raw: unknown): { content?: string; error?: string } {
  const error = field(field(raw, 'error'), 'message');
  const choices = field(raw, 'choices');
  const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
  const content = field(field(first, 'message'), 'content');
  return {
    content: typeof content === 'string' ? content : undefined,
    error: typeof error === 'string' ? error : undefined,
  };
}

export class ChatCompletionClient implements SummarizationClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: ChatClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get model(): string {
    return this.options.model;
  }

  async summarize(prompt: string): Promise<string> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.options.apiKey) {
      headers.authorization = `Bearer ${this.options.apiKey}`;
    }

    const response = await this.fetchImpl(this.options.apiUrl, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        model: this.options.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: this.options.temperature,
        max_tokens: this.options.maxTokens,
      }),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(
        `${this.options.apiUrl} responded ${response.status}${body ? `: ${body.slice(0, 200)}` : ''}`
      );
    }

    const parsed = parseChatResponse(await response.json());
    if (parsed.error) {
      throw new Error(parsed.error);
    }

    const content = parsed.content?.trim();
    if (!content) {
      throw new Error('response contained no content');
    }
    return content;
  }
}


/**
 * Minimal Ollama completion client (`POST /api/generate`, non-streaming).
 *
 * Prompt text in, completion text out. The execution core does not use it.
 */

import { z } from 'zod';
import { logger as rootLogger } from '../utils/logger.js';
import { NetworkError, TimeoutError } from '@snippet-sandbox/shared/Types/errors.js';

export interface OllamaClientOptions {
  baseUrl: string;
  defaultModel: string;
  timeoutMs: number;
  /** Injected for tests; defaults to the global fetch. */
  fetch?: typeof fetch;
}

export interface GenerateOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

const generateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
  done: z.boolean().optional(),
});

export interface Completion {
  model: string;
  completion: string;
}

export class OllamaClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger = rootLogger.child('ollama');

  constructor(private readonly options: OllamaClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async generate(prompt: string, opts: GenerateOptions = {}): Promise<Completion> {
    const model = opts.model ?? this.options.defaultModel;
    const url = `${this.baseUrl}/api/generate`;

    this.logger.debug(`Requesting completion from ${model}`, { promptChars: prompt.length });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model,
          prompt,
          stream: false,
          options: {
            temperature: opts.temperature ?? 0,
            num_predict: opts.maxTokens ?? 1200,
          },
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
        throw new TimeoutError(`Ollama did not answer within ${this.options.timeoutMs}ms`, { url });
      }
      throw new NetworkError(`Ollama request failed: ${err instanceof Error ? err.message : String(err)}`, { url });
    }

    if (!response.ok) {
      const body = await response.text();
      throw new NetworkError(`Ollama request failed (${response.status}): ${body}`, {
        url,
        status: response.status,
      });
    }

    const parsed = generateResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new NetworkError('Ollama response is missing the "response" field', { url });
    }

    return { model: parsed.data.model ?? model, completion: parsed.data.response.trim() };
  }
}

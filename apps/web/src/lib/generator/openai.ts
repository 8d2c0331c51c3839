import type { GeneratorSettings } from '../config';
import { logEvent, truncate } from '../log';
import { errorMessage } from '../syncErrors';
import type { ContentGenerator, GenerationKind } from '../sync/types';
import type { FetchLike } from '../babbel/client';
import { DEFAULT_PROMPTS } from './prompts';

export type ChatMessage = {
  role: 'system' | 'user' | 'assistant';
  content: string;
};

export type OpenAiGeneratorOptions = {
  settings: GeneratorSettings;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  maxAttempts?: number;
  timeoutMs?: number;
};

const RETRY_BASE_MS = 2_000;

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

// choices[0].message.content
function extractContent(decoded: Record<string, unknown>): string | null {
  const choices = decoded.choices;
  if (!Array.isArray(choices) || choices.length === 0) return null;
  const first: unknown = choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return null;
  const content = first.message.content;
  return typeof content === 'string' ? content : null;
}

export function retryDelayMs(failedAttempts: number): number {
  return RETRY_BASE_MS * 2 ** (failedAttempts - 1);
}

export class OpenAiGenerator implements ContentGenerator {
  private settings: GeneratorSettings;
  private fetchImpl: FetchLike;
  private sleep: (ms: number) => Promise<void>;
  private maxAttempts: number;
  private timeoutMs: number;

  constructor(options: OpenAiGeneratorOptions) {
    this.settings = options.settings;
    this.fetchImpl = options.fetchImpl || fetch;
    this.sleep = options.sleep || sleep;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async generate(sourceText: string, kind: GenerationKind): Promise<string | null> {
    const configured = kind === 'title' ? this.settings.titlePrompt : this.settings.speechPrompt;
    const messages: ChatMessage[] = [
      { role: 'system', content: configured || DEFAULT_PROMPTS[kind] },
      { role: 'user', content: sourceText },
    ];
    return this.completeWithRetry(messages, kind);
  }

  /** Blocks between attempts; call only from the worker. */
  private async completeWithRetry(messages: ChatMessage[], kind: GenerationKind): Promise<string | null> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      const result = await this.complete(messages, kind);
      if (result !== null) return result;
      if (attempt < this.maxAttempts) {
        const delayMs = retryDelayMs(attempt);
        logEvent('info', 'generator.retry', { kind, attempt, maxAttempts: this.maxAttempts, delayMs });
        await this.sleep(delayMs);
      }
    }
    logEvent('error', 'generator.exhausted', { kind, code: 'GENERATION_FAILURE', maxAttempts: this.maxAttempts });
    return null;
  }

  private async complete(messages: ChatMessage[], kind: GenerationKind): Promise<string | null> {
    const { apiKey, apiUrl, model } = this.settings;
    if (!apiKey) {
      logEvent('error', 'generator.missing_api_key', { model, code: 'CONFIGURATION_ERROR' });
      return null;
    }

    let status: number;
    let body: string;
    try {
      const response = await this.fetchImpl(apiUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model,
          messages,
          max_tokens: 1000,
          temperature: 0.7,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = response.status;
      body = await response.text();
    } catch (error) {
      logEvent('error', 'generator.request_failed', { model, kind, code: 'TRANSPORT_ERROR', error: errorMessage(error) });
      return null;
    }

    logEvent('debug', 'generator.response', { model, kind, responseCode: status, bodyLength: body.length });

    let decoded: unknown;
    try {
      decoded = JSON.parse(body);
    } catch (error) {
      logEvent('error', 'generator.invalid_json', {
        model,
        kind,
        error: errorMessage(error),
        responseBody: truncate(body, 500),
      });
      return null;
    }
    if (!isRecord(decoded)) {
      logEvent('error', 'generator.unexpected_response', { model, kind, responseCode: status });
      return null;
    }

    if (decoded.error !== undefined && decoded.error !== null) {
      const apiError = isRecord(decoded.error) ? decoded.error : {};
      logEvent('error', 'generator.api_error', {
        model,
        kind,
        responseCode: status,
        apiError: typeof apiError.message === 'string' ? apiError.message : 'unknown',
        errorType: typeof apiError.type === 'string' ? apiError.type : 'unknown',
      });
      return null;
    }

    const content = extractContent(decoded);
    if (content === null) {
      logEvent('error', 'generator.unexpected_response', { model, kind, responseKeys: Object.keys(decoded) });
      return null;
    }

    const trimmed = content.trim();
    logEvent('info', 'generator.completed', { model, kind, contentLength: trimmed.length });
    return trimmed;
  }
}

/**
 * Ollama Message Provider
 *
 * Generates LUNA messages with a local Ollama server through its
 * /api/generate endpoint. Every failure surfaces as a MessageProviderError.
 */

import { createSubsystemLogger, describeError } from '../../logging/subsystem.js';
import type { DisplayConfig, MessageProvider, MessageRequest } from '../types/index.js';

const log = createSubsystemLogger('oled/ollama');

export type MessageProviderErrorKind = 'timeout' | 'http' | 'payload' | 'transport';

export class MessageProviderError extends Error {
  readonly kind: MessageProviderErrorKind;
  readonly status?: number;

  constructor(kind: MessageProviderErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'MessageProviderError';
    this.kind = kind;
    this.status = status;
  }
}

export type OllamaProviderOptions = Pick<DisplayConfig['ollama'], 'baseUrl' | 'model' | 'timeoutMs'>;

interface GenerateRequestBody {
  model: string;
  prompt: string;
  stream: false;
  options: {
    temperature: number;
    num_predict: number;
  };
}

/**
 * Collapses line breaks and runs of whitespace so the reply fits one marquee
 */
export function normalizeMessage(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Pulls the generated text out of a non-streaming /api/generate reply
 */
export function extractResponseText(payload: unknown): string {
  const response = isRecord(payload) ? payload.response : undefined;
  if (typeof response !== 'string') {
    throw new MessageProviderError('payload', 'Ollama reply has no "response" text');
  }
  const text = normalizeMessage(response);
  if (text.length === 0) {
    throw new MessageProviderError('payload', 'Ollama returned an empty response');
  }
  return text;
}

export class OllamaMessageProvider implements MessageProvider {
  private options: OllamaProviderOptions;

  constructor(options: OllamaProviderOptions) {
    this.options = options;
  }

  get endpoint(): string {
    return `${this.options.baseUrl.replace(/\/+$/, '')}/api/generate`;
  }

  async generate(request: MessageRequest): Promise<string> {
    const body: GenerateRequestBody = {
      model: this.options.model,
      prompt: request.prompt,
      stream: false,
      options: {
        temperature: request.temperature,
        num_predict: request.maxTokens,
      },
    };

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new MessageProviderError('timeout', `Ollama did not answer within ${this.options.timeoutMs}ms`);
      }
      throw new MessageProviderError('transport', `Ollama request failed: ${describeError(error)}`);
    }

    if (!response.ok) {
      throw new MessageProviderError('http', `Ollama answered with HTTP ${response.status}`, response.status);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new MessageProviderError('timeout', `Ollama did not answer within ${this.options.timeoutMs}ms`);
      }
      throw new MessageProviderError('payload', `Ollama reply is not JSON: ${describeError(error)}`);
    }

    const text = extractResponseText(payload);
    log.debug('Ollama generated a message', { model: this.options.model, length: text.length });
    return text;
  }
}

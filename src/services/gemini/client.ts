import { GoogleGenAI } from '@google/genai';
import { GEMINI_SAFETY_SETTINGS, GEMINI_SAMPLING } from '../../config/constants.js';
import { isTransientError, withRetry, type RetryOptions } from '../../lib/retry.js';
import { createChildLogger } from '../../lib/logger.js';
import type {
  GenerationOutcome,
  GenerationRequest,
  GenerationTransport,
  PostGenerator,
  PostVariant,
  SafetySetting,
  SamplingConfig,
} from './types.js';

const log = createChildLogger('gemini');

export class EmptyResponseError extends Error {
  constructor(public model: string) {
    super(`Gemini model ${model} returned no text`);
    this.name = 'EmptyResponseError';
  }
}

async function sendOnce(transport: GenerationTransport, request: GenerationRequest): Promise<string> {
  const reply = await transport.send(request);
  if (!reply || !reply.trim()) {
    throw new EmptyResponseError(request.model);
  }
  return reply;
}

/**
 * Transport backed by @google/genai. Each call opens a fresh chat session
 * with no history and sends the prompt as its only message.
 */
export function createGenAiTransport(apiKey: string): GenerationTransport {
  const ai = new GoogleGenAI({ apiKey });

  return {
    async send(request: GenerationRequest): Promise<string | undefined> {
      const chat = ai.chats.create({
        model: request.model,
        history: [],
        config: {
          ...request.sampling,
          maxOutputTokens: request.maxOutputTokens,
          safetySettings: [...request.safetySettings],
        },
      });

      const response = await chat.sendMessage({ message: request.prompt });
      return response.text;
    },
  };
}

export interface GeminiClientOptions {
  apiKey?: string;
  variant: PostVariant;
  /** Overrides the variant's model id. */
  model?: string;
  sampling?: SamplingConfig;
  safetySettings?: readonly SafetySetting[];
  retry?: RetryOptions;
  transport?: GenerationTransport;
}

export class GeminiClient implements PostGenerator {
  readonly model: string;
  private readonly send: ((request: GenerationRequest) => Promise<string>) | undefined;
  private readonly maxOutputTokens: number;
  private readonly sampling: SamplingConfig;
  private readonly safetySettings: readonly SafetySetting[];
  private readonly retryOptions: RetryOptions;

  constructor(options: GeminiClientOptions) {
    this.model = options.model ?? options.variant.model;
    this.maxOutputTokens = options.variant.maxOutputTokens;
    this.sampling = options.sampling ?? GEMINI_SAMPLING;
    this.safetySettings = options.safetySettings ?? GEMINI_SAFETY_SETTINGS;
    this.retryOptions = options.retry ?? {};

    // Without a key there is nothing to call; generate() reports it per request.
    const transport = options.apiKey
      ? (options.transport ?? createGenAiTransport(options.apiKey))
      : undefined;
    this.send = transport
      ? withRetry((request: GenerationRequest) => sendOnce(transport, request), this.retryOptions)
      : undefined;
  }

  get hasCredential(): boolean {
    return this.send !== undefined;
  }

  /**
   * Send the prompt and return the generated post. Never rejects: every
   * failure, including exhausted retries, resolves to `{ ok: false }`.
   */
  async generate(prompt: string): Promise<GenerationOutcome> {
    const send = this.send;
    if (!send) {
      log.error({ model: this.model }, 'GEMINI_API_KEY is not configured');
      return {
        ok: false,
        reason: 'missing_credential',
        message: 'GEMINI_API_KEY is not configured',
      };
    }

    const request: GenerationRequest = {
      model: this.model,
      prompt,
      sampling: this.sampling,
      maxOutputTokens: this.maxOutputTokens,
      safetySettings: this.safetySettings,
    };

    log.info({ model: this.model, prompt }, 'Generating post');

    try {
      const text = await send(request);

      log.info({ model: this.model }, 'Post generated');
      return { ok: true, text: text.trim() };
    } catch (err) {
      const shouldRetry = this.retryOptions.shouldRetry ?? isTransientError;
      const reason = shouldRetry(err) ? 'exhausted' : 'rejected';

      log.error({ err, model: this.model, reason }, 'Post generation failed');
      return {
        ok: false,
        reason,
        message: err instanceof Error ? err.message : String(err),
      };
    }
  }
}

import { vi } from 'vitest';
import type {
  GenerationOutcome,
  GenerationRequest,
  GenerationTransport,
  PostGenerator,
} from '../../src/services/gemini/types.js';

/** Generator that resolves every call with the given outcome. */
export function fakeGenerator(outcome: GenerationOutcome, model = 'gemini-test') {
  const generate = vi.fn(async (_prompt: string) => outcome);
  const generator: PostGenerator = { model, hasCredential: true, generate };
  return { generator, generate };
}

/**
 * Transport that throws `failures` errors before returning `text`.
 * Each thrown error comes from `makeError`, so tests control its shape.
 */
export function flakyTransport(
  failures: number,
  text: string | undefined = 'Generated post',
  makeError: (call: number) => unknown = (call) => new Error(`network down (call ${call})`),
) {
  const requests: GenerationRequest[] = [];
  const transport: GenerationTransport = {
    async send(request) {
      requests.push(request);
      if (requests.length <= failures) {
        throw makeError(requests.length);
      }
      return text;
    },
  };
  return { transport, requests };
}

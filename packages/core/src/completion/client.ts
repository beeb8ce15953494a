import { CompletionError, errorMessage } from '../errors.ts';

/** Anything that turns a prompt into generated text. */
export interface CompletionProvider {
  invoke(prompt: string, options: { signal: AbortSignal }): Promise<string>;
}

export interface CompletionClientOptions {
  /** Abandon a call after this many milliseconds. Default 30000. */
  timeoutMs?: number;
}

export const DEFAULT_COMPLETION_TIMEOUT_MS = 30_000;

/**
 * Non-blocking wrapper around a completion provider. Every failure
 * (provider error, timeout, caller cancellation, empty output) rejects
 * with a CompletionError. There is no retry.
 */
export class CompletionClient {
  readonly timeoutMs: number;

  constructor(
    private provider: CompletionProvider,
    options: CompletionClientOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMPLETION_TIMEOUT_MS;
  }

  async complete(prompt: string, options?: { signal?: AbortSignal }): Promise<string> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options?.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    let text: string;
    try {
      text = await abandonOnAbort(this.provider.invoke(prompt, { signal }), signal);
    } catch (err) {
      throw this.normalize(err, options?.signal);
    }

    if (!text.trim()) {
      throw new CompletionError('empty response from completion provider', 'empty');
    }
    return text;
  }

  private normalize(err: unknown, callerSignal: AbortSignal | undefined): CompletionError {
    if (callerSignal?.aborted) {
      return new CompletionError('request cancelled', 'cancelled', { cause: err });
    }
    if (err instanceof CompletionError) {
      return err;
    }
    if (isTimeout(err)) {
      return new CompletionError(`timeout after ${this.timeoutMs}ms`, 'timeout', { cause: err });
    }
    return new CompletionError(errorMessage(err) || 'unknown provider error', 'provider', { cause: err });
  }
}

/** User-facing text for a failed completion. */
export function apologyFor(err: CompletionError): string {
  return `I encountered an error: ${err.detail}. Please try again.`;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && err.name === 'TimeoutError';
}

// Stop waiting as soon as the signal fires, even if the provider ignores it.
function abandonOnAbort<T>(pending: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    pending.catch(() => undefined);
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    pending.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

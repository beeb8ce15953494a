import { describe, it, expect, vi } from 'vitest';
import { CompletionClient, apologyFor, DEFAULT_COMPLETION_TIMEOUT_MS } from '../../src/completion/client.ts';
import { CompletionError } from '../../src/errors.ts';

const never = () => new Promise<string>(() => {});

describe('CompletionClient', () => {
  it('should return the provider text', async () => {
    const invoke = vi.fn(async (prompt: string) => `echo: ${prompt}`);
    const client = new CompletionClient({ invoke });
    await expect(client.complete('ping')).resolves.toBe('echo: ping');
    expect(invoke).toHaveBeenCalledTimes(1);
  });

  it('should default the timeout', () => {
    const client = new CompletionClient({ invoke: async () => 'x' });
    expect(client.timeoutMs).toBe(DEFAULT_COMPLETION_TIMEOUT_MS);
  });

  it('should translate provider errors into CompletionError', async () => {
    const cause = new Error('401 Unauthorized');
    const client = new CompletionClient({
      invoke: async () => {
        throw cause;
      },
    });

    const err = await client.complete('x').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CompletionError);
    expect(err).toMatchObject({ kind: 'provider', message: '401 Unauthorized', cause });
  });

  it('should stringify non-Error failures', async () => {
    const client = new CompletionClient({
      invoke: () => Promise.reject('socket hang up'),
    });
    await expect(client.complete('x')).rejects.toMatchObject({ kind: 'provider', message: 'socket hang up' });
  });

  it('should pass CompletionError through unchanged', async () => {
    const original = new CompletionError('quota exceeded');
    const client = new CompletionClient({
      invoke: async () => {
        throw original;
      },
    });
    await expect(client.complete('x')).rejects.toBe(original);
  });

  it('should time out a provider that never answers', async () => {
    const client = new CompletionClient({ invoke: never }, { timeoutMs: 20 });
    await expect(client.complete('x')).rejects.toMatchObject({
      name: 'CompletionError',
      kind: 'timeout',
      message: 'timeout after 20ms',
    });
  });

  it('should abandon the call when the caller aborts', async () => {
    let providerSignal: AbortSignal | undefined;
    const client = new CompletionClient({
      invoke: (_prompt, { signal }) => {
        providerSignal = signal;
        return never();
      },
    });
    const controller = new AbortController();
    const pending = client.complete('x', { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ kind: 'cancelled', message: 'request cancelled' });
    expect(providerSignal?.aborted).toBe(true);
  });

  it('should reject immediately when the caller signal is already aborted', async () => {
    const invoke = vi.fn(never);
    const client = new CompletionClient({ invoke });
    await expect(client.complete('x', { signal: AbortSignal.abort() })).rejects.toMatchObject({
      kind: 'cancelled',
    });
  });

  it('should treat blank output as a failure', async () => {
    const client = new CompletionClient({ invoke: async () => '  \n ' });
    await expect(client.complete('x')).rejects.toMatchObject({
      kind: 'empty',
      message: 'empty response from completion provider',
    });
  });

  it('should not retry', async () => {
    const invoke = vi.fn(async (): Promise<string> => {
      throw new Error('boom');
    });
    const client = new CompletionClient({ invoke });
    await expect(client.complete('x')).rejects.toBeInstanceOf(CompletionError);
    expect(invoke).toHaveBeenCalledTimes(1);
  });
});

describe('apologyFor', () => {
  it('should embed the detail and invite a retry', () => {
    expect(apologyFor(new CompletionError('timeout', 'timeout'))).toBe(
      'I encountered an error: timeout. Please try again.',
    );
  });
});

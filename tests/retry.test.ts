import { describe, it, expect } from '@jest/globals';
import { withRetry } from '../src/utils/retry';
import { EmbeddingError } from '../src/utils/errors';

describe('withRetry', () => {
  it('should retry until the task succeeds', async () => {
    let attempts = 0;

    const result = await withRetry(
      async () => {
        attempts += 1;
        if (attempts < 3) throw new Error('temporary');
        return 'done';
      },
      message => new EmbeddingError(message),
      { retryDelay: 1 }
    );

    expect(result).toBe('done');
    expect(attempts).toBe(3);
  });

  it('should wrap the last failure', async () => {
    let attempts = 0;

    const run = withRetry(
      async () => {
        attempts += 1;
        throw new Error('boom');
      },
      message => new EmbeddingError(message),
      { maxRetries: 1, retryDelay: 1, operation: 'embedding' }
    );

    await expect(run).rejects.toThrow(new EmbeddingError('Failed embedding after 2 attempts: boom'));
    expect(attempts).toBe(2);
  });
});

import { describe, it, expect } from 'vitest';
import { withTimeout } from '../../../src/utils/timeout.js';

describe('withTimeout', () => {
  it('returns the value of a call that settles in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 50, () => new Error('late'))).resolves.toBe(7);
  });

  it('rejects with the supplied error when the call is too slow', async () => {
    const never = new Promise<number>(() => undefined);

    await expect(withTimeout(never, 5, () => new Error('late'))).rejects.toThrow('late');
  });
});

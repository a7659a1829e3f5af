/**
 * Tests for the abortable delay
 */

import { describe, it, expect } from 'vitest';
import { sleep } from '../../src/utils/sleep';
import { RunAbortedError } from '../../src/utils/errors';

describe('sleep', () => {
  it('resolves immediately for non-positive delays', async () => {
    await expect(sleep(0)).resolves.toBeUndefined();
    await expect(sleep(-5)).resolves.toBeUndefined();
  });

  it('resolves after a short delay', async () => {
    await expect(sleep(5)).resolves.toBeUndefined();
  });

  it('rejects with RunAbortedError when aborted', async () => {
    const abort = new AbortController();
    const pending = sleep(10_000, abort.signal);
    abort.abort();
    await expect(pending).rejects.toBeInstanceOf(RunAbortedError);
  });
});

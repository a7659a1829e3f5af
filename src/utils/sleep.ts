/**
 * Abortable delay
 */

import { setTimeout as delay } from 'timers/promises';
import { RunAbortedError } from './errors';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  if (ms <= 0) return;

  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new RunAbortedError('Run interrupted while waiting');
    }
    throw error;
  }
};

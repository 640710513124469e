/**
 * Cooperative cancellation helpers
 *
 * Worker-side operations receive an AbortSignal and check it at fixed
 * checkpoints; nothing is ever interrupted mid-step.
 */

import { CancelledError } from './errors.js';

export function throwIfCancelled(signal: AbortSignal | undefined, checkpoint?: string): void {
  if (signal?.aborted) {
    throw new CancelledError(checkpoint ? `Operation cancelled before ${checkpoint}` : 'Operation cancelled');
  }
}

export function isCancellation(error: unknown): boolean {
  return error instanceof CancelledError;
}

import { describe, expect, it } from 'vitest';

import { assertTransition, canTransition, isTerminal } from '../src/domain/job-model.js';

describe('domain/job-model - job status transitions', () => {
  /**
   * Intent:
   * - Status only moves forward; completed and failed are final.
   * - pending -> failed exists for jobs cancelled before their first stage.
   */

  it('allows the forward transitions', () => {
    expect(canTransition('pending', 'pending')).toBe(true);
    expect(canTransition('pending', 'processing')).toBe(true);
    expect(canTransition('pending', 'failed')).toBe(true);

    expect(canTransition('processing', 'processing')).toBe(true);
    expect(canTransition('processing', 'completed')).toBe(true);
    expect(canTransition('processing', 'failed')).toBe(true);
  });

  it('rejects skipping processing on the way to completed', () => {
    expect(canTransition('pending', 'completed')).toBe(false);
  });

  it('rejects transitions out of terminal statuses', () => {
    expect(canTransition('completed', 'pending')).toBe(false);
    expect(canTransition('completed', 'processing')).toBe(false);
    expect(canTransition('completed', 'failed')).toBe(false);
    expect(canTransition('completed', 'completed')).toBe(false);

    expect(canTransition('failed', 'pending')).toBe(false);
    expect(canTransition('failed', 'processing')).toBe(false);
    expect(canTransition('failed', 'completed')).toBe(false);
  });

  it('rejects backwards transitions', () => {
    expect(canTransition('processing', 'pending')).toBe(false);
  });

  it('assertTransition throws with both statuses in the message', () => {
    expect(() => assertTransition('pending', 'processing')).not.toThrow();
    expect(() => assertTransition('failed', 'processing')).toThrow(
      'Invalid job status transition: failed -> processing',
    );
  });

  it('isTerminal is true only for completed and failed', () => {
    expect(isTerminal('pending')).toBe(false);
    expect(isTerminal('processing')).toBe(false);
    expect(isTerminal('completed')).toBe(true);
    expect(isTerminal('failed')).toBe(true);
  });
});

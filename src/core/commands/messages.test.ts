/**
 * Notice Formatting Tests
 */

import { describe, it, expect } from '@jest/globals';
import { formatFailure, formatStep } from './messages.js';
import { failure } from '../engine/types.js';

describe('formatStep', () => {
  it('should name a single step', () => {
    expect(formatStep('undo', { ok: true, steps: 1, inRegion: false })).toBe('Undo');
    expect(formatStep('redo', { ok: true, steps: 1, inRegion: false })).toBe('Redo');
  });

  it('should mention region scoping', () => {
    expect(formatStep('undo', { ok: true, steps: 1, inRegion: true })).toBe('Undo in region');
  });

  it('should count multiple steps', () => {
    expect(formatStep('redo', { ok: true, steps: 3, inRegion: true })).toBe('Redo in region (3 steps)');
  });
});

describe('formatFailure', () => {
  it('should format checkpoint refusals', () => {
    expect(formatFailure('redo', failure('no-undo-to-redo'))).toBe('No undo to redo');
    expect(formatFailure('redo', failure('redo-step-not-found'))).toBe('Redo step not found');
    expect(formatFailure('redo', failure('redo-end-point-hit'))).toBe('Redo end-point hit');
  });

  it('should prefer the host text for exhausted history', () => {
    expect(formatFailure('undo', failure('no-further-undo'))).toBe('No further undo information');
    expect(formatFailure('undo', failure('no-further-undo', 'No further undo information in region'))).toBe(
      'No further undo information in region'
    );
  });

  it('should echo an invalid step count', () => {
    expect(formatFailure('redo', failure('invalid-step-count', '-2'))).toBe('Redo: invalid step count -2');
  });

  it('should report host errors', () => {
    expect(formatFailure('undo', failure('host-error', 'boom'))).toBe('Undo failed: boom');
    expect(formatFailure('redo', failure('host-error'))).toBe('Redo failed: unknown error');
  });
});

describe('failure', () => {
  it('should omit an absent detail', () => {
    expect(failure('no-undo-to-redo')).toEqual({ ok: false, failure: 'no-undo-to-redo', applied: 0 });
  });

  it('should carry the applied count', () => {
    expect(failure('no-further-undo', 'done', 2)).toEqual({
      ok: false,
      failure: 'no-further-undo',
      detail: 'done',
      applied: 2,
    });
  });
});

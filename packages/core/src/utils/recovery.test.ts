/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';
import { delay, describeError, isRateLimitError } from './recovery.js';

describe('Recovery utilities', () => {
  describe('isRateLimitError', () => {
    it('should detect a 429 status in the message', () => {
      expect(isRateLimitError(new Error('got status: 429 Too Many Requests'))).toBe(true);
    });

    it('should detect quota exhaustion regardless of case', () => {
      expect(isRateLimitError(new Error('Resource has been exhausted (e.g. check QUOTA).'))).toBe(true);
    });

    it('should detect a rate limit phrase', () => {
      expect(isRateLimitError('Rate limit reached for requests')).toBe(true);
    });

    it('should ignore other failures', () => {
      expect(isRateLimitError(new Error('fetch failed'))).toBe(false);
      expect(isRateLimitError(new Error('got status: 500 Internal Server Error'))).toBe(false);
    });
  });

  describe('describeError', () => {
    it('should use the message of an Error', () => {
      expect(describeError(new Error('boom'))).toBe('boom');
    });

    it('should stringify anything else', () => {
      expect(describeError(404)).toBe('404');
    });
  });

  describe('delay', () => {
    it('should resolve after the given time', async () => {
      vi.useFakeTimers();
      const done = vi.fn();
      const pending = delay(2000).then(done);

      await vi.advanceTimersByTimeAsync(1999);
      expect(done).not.toHaveBeenCalled();
      await vi.advanceTimersByTimeAsync(1);
      await pending;
      expect(done).toHaveBeenCalledTimes(1);

      vi.useRealTimers();
    });
  });
});

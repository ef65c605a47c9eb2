/**
 * Management Update Window Tests
 */

import { describe, it, expect } from 'vitest';
import { evaluateWindow, recordUpdate } from '../../../src/services/updateWindow.js';

const HOUR = 60 * 60 * 1000;
const policy = { ceiling: 3, windowMs: 24 * HOUR };
const start = new Date('2026-03-01T09:00:00.000Z');

function at(offsetMs: number): Date {
  return new Date(start.getTime() + offsetMs);
}

describe('updateWindow', () => {
  describe('evaluateWindow', () => {
    it('should allow the full ceiling on an unused window', () => {
      expect(evaluateWindow({ count: 0, startedAt: null }, start, policy)).toEqual({
        used: 0,
        remaining: 3,
        retryAfterSeconds: null,
      });
    });

    it('should count updates inside the live window', () => {
      expect(evaluateWindow({ count: 2, startedAt: start }, at(HOUR), policy)).toEqual({
        used: 2,
        remaining: 1,
        retryAfterSeconds: null,
      });
    });

    it('should report when a full window rolls over', () => {
      expect(evaluateWindow({ count: 3, startedAt: start }, at(HOUR), policy)).toEqual({
        used: 3,
        remaining: 0,
        retryAfterSeconds: 23 * 60 * 60,
      });
    });

    it('should round a partial second up', () => {
      const allowance = evaluateWindow({ count: 3, startedAt: start }, at(24 * HOUR - 1500), policy);
      expect(allowance.retryAfterSeconds).toBe(2);
    });

    it('should ignore a stored count once the window elapsed', () => {
      expect(evaluateWindow({ count: 3, startedAt: start }, at(24 * HOUR), policy)).toEqual({
        used: 0,
        remaining: 3,
        retryAfterSeconds: null,
      });
    });
  });

  describe('recordUpdate', () => {
    it('should open a window on the first update', () => {
      expect(recordUpdate({ count: 0, startedAt: null }, start, policy)).toEqual({
        count: 1,
        startedAt: start,
      });
    });

    it('should keep the window start while it is live', () => {
      expect(recordUpdate({ count: 1, startedAt: start }, at(5 * HOUR), policy)).toEqual({
        count: 2,
        startedAt: start,
      });
    });

    it('should restart an elapsed window', () => {
      const later = at(30 * HOUR);
      expect(recordUpdate({ count: 3, startedAt: start }, later, policy)).toEqual({
        count: 1,
        startedAt: later,
      });
    });
  });
});

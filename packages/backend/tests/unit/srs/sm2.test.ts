/**
 * SM-2 状态转移测试
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { type CardState, type ReviewQuality, addDays } from '@lexiloop/shared';
import { InvalidRatingError } from '../../../src/errors';
import {
  DEFAULT_EASE,
  LEARNING_STEP,
  MIN_EASE,
  adjustEase,
  assertQuality,
  computeNextState,
  createVirginState,
} from '../../../src/srs';

const NOW = new Date('2024-06-01T09:00:00.000Z');

function makeState(overrides: Partial<CardState> = {}): CardState {
  return { ...createVirginState('item-1'), ...overrides };
}

const stateArb = fc.record({
  easeFactor: fc.double({ min: MIN_EASE, max: 3.5, noNaN: true }),
  interval: fc.double({ min: 0, max: 365, noNaN: true }),
  repetition: fc.integer({ min: 0, max: 20 }),
});

describe('sm2', () => {
  describe('adjustEase', () => {
    it.each<[ReviewQuality, number]>([
      [5, 2.6],
      [4, 2.5],
      [3, 2.36],
      [2, 2.18],
      [1, 1.96],
      [0, 1.7],
    ])('quality %s should move ease 2.5 to %s', (quality, expected) => {
      expect(adjustEase(2.5, quality)).toBeCloseTo(expected, 10);
    });

    it('should never drop below the floor', () => {
      expect(adjustEase(1.4, 0)).toBe(MIN_EASE);
      expect(adjustEase(MIN_EASE, 2)).toBe(MIN_EASE);
    });
  });

  describe('assertQuality', () => {
    it('should pass valid ratings through', () => {
      expect(assertQuality(0)).toBe(0);
      expect(assertQuality(5)).toBe(5);
    });

    it.each([-1, 6, 3.5, Number.NaN, '4'])('should reject %s', (quality) => {
      expect(() => assertQuality(quality)).toThrow(InvalidRatingError);
    });
  });

  describe('computeNextState', () => {
    it('should walk the learning ramp for a new item rated 4 each time', () => {
      const first = computeNextState(makeState(), 4, NOW);
      expect(first.interval).toBe(LEARNING_STEP);
      expect(first.repetition).toBe(1);

      const second = computeNextState(first, 4, NOW);
      expect(second.interval).toBe(1.0);
      expect(second.repetition).toBe(2);

      const third = computeNextState(second, 4, NOW);
      expect(third.interval).toBe(6.0);
      expect(third.repetition).toBe(3);
      expect(third.easeFactor).toBeCloseTo(DEFAULT_EASE, 10);

      const fourth = computeNextState(third, 4, NOW);
      expect(fourth.interval).toBeCloseTo(6.0 * fourth.easeFactor, 10);
      expect(fourth.interval).toBeCloseTo(15.0, 10);
      expect(fourth.repetition).toBe(4);
    });

    it('should fully reset a mature card on failure', () => {
      const state = makeState({ repetition: 3, interval: 15.0, easeFactor: 2.5, lastReviewedAt: NOW });
      const next = computeNextState(state, 1, addDays(NOW, 15));

      expect(next.interval).toBe(0);
      expect(next.repetition).toBe(0);
      expect(next.easeFactor).toBeCloseTo(1.96, 10);
      expect(next.lastReviewedAt).toEqual(addDays(NOW, 15));
    });

    it('should cap growth after a severely overdue success', () => {
      const state = makeState({
        repetition: 5,
        interval: 10,
        easeFactor: 2.5,
        lastReviewedAt: addDays(NOW, -40),
      });
      const next = computeNextState(state, 4, NOW);

      expect(next.interval).toBeCloseTo(12.0, 10);
      expect(next.repetition).toBe(6);
    });

    it('should not cap a success that is late but within three intervals', () => {
      const state = makeState({
        repetition: 5,
        interval: 10,
        easeFactor: 2.5,
        lastReviewedAt: addDays(NOW, -30),
      });
      expect(computeNextState(state, 4, NOW).interval).toBeCloseTo(25.0, 10);
    });

    it('should not cap cards whose previous interval is at most one day', () => {
      const state = makeState({ repetition: 2, interval: 1.0, lastReviewedAt: addDays(NOW, -10) });
      expect(computeNextState(state, 4, NOW).interval).toBe(6.0);
    });

    it('should stamp the review time and leave the input untouched', () => {
      const state = makeState({ repetition: 1, interval: LEARNING_STEP, lastReviewedAt: NOW });
      const snapshot = { ...state };
      const later = addDays(NOW, 1);

      const next = computeNextState(state, 5, later);

      expect(next).not.toBe(state);
      expect(state).toEqual(snapshot);
      expect(next.lastReviewedAt).toEqual(later);
      expect(next.itemId).toBe('item-1');
    });

    it('should reject invalid ratings without producing a state', () => {
      expect(() => computeNextState(makeState(), 7, NOW)).toThrow(InvalidRatingError);
      expect(() => computeNextState(makeState(), -1, NOW)).toThrow(InvalidRatingError);
    });
  });

  describe('properties', () => {
    it('passing reviews follow the interval branch table', () => {
      fc.assert(
        fc.property(stateArb, fc.integer({ min: 3, max: 5 }), (partial, quality) => {
          const state = makeState({ ...partial, lastReviewedAt: NOW });
          const next = computeNextState(state, quality, NOW);

          expect(next.repetition).toBe(state.repetition + 1);
          if (state.repetition === 0) {
            expect(next.interval).toBe(LEARNING_STEP);
          } else if (state.repetition === 1) {
            expect(next.interval).toBe(1.0);
          } else if (state.repetition === 2) {
            expect(next.interval).toBe(6.0);
          } else {
            expect(next.interval).toBe(state.interval * next.easeFactor);
          }
          return true;
        }),
        { numRuns: 200 },
      );
    });

    it('failing reviews always reset interval and repetition', () => {
      fc.assert(
        fc.property(stateArb, fc.integer({ min: 0, max: 2 }), (partial, quality) => {
          const next = computeNextState(makeState({ ...partial, lastReviewedAt: NOW }), quality, NOW);
          expect(next.interval).toBe(0);
          expect(next.repetition).toBe(0);
          return true;
        }),
        { numRuns: 200 },
      );
    });

    it('ease never falls below the floor under repeated zero ratings', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 60 }), (rounds) => {
          let state = makeState();
          for (let i = 0; i < rounds; i++) {
            state = computeNextState(state, 0, NOW);
            expect(state.easeFactor).toBeGreaterThanOrEqual(MIN_EASE);
          }
          return true;
        }),
        { numRuns: 50 },
      );
    });

    it('quality 5 raises ease and quality 0 never raises it', () => {
      fc.assert(
        fc.property(stateArb, (partial) => {
          const state = makeState(partial);
          expect(computeNextState(state, 5, NOW).easeFactor).toBeGreaterThan(state.easeFactor);
          expect(computeNextState(state, 0, NOW).easeFactor).toBeLessThanOrEqual(state.easeFactor);
          return true;
        }),
        { numRuns: 200 },
      );
    });
  });
});

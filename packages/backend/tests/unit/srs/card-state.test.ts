import { describe, it, expect } from 'vitest';
import { type CardState, type ReviewEvent, addDays } from '@lexiloop/shared';
import {
  DEFAULT_EASE,
  classifyCard,
  createVirginState,
  deriveState,
  dueAt,
  isDue,
  isLearning,
  overdueFactor,
  stateFromEvent,
} from '../../../src/srs';

const NOW = new Date('2024-06-01T09:00:00.000Z');

function reviewed(overrides: Partial<CardState>): CardState {
  return {
    itemId: 'item-1',
    easeFactor: DEFAULT_EASE,
    interval: 1,
    repetition: 2,
    lastReviewedAt: NOW,
    ...overrides,
  };
}

describe('card-state', () => {
  it('should build the implicit state of an unseen item', () => {
    expect(createVirginState('item-9')).toEqual({
      itemId: 'item-9',
      easeFactor: 2.5,
      interval: 0,
      repetition: 0,
      lastReviewedAt: null,
    });
  });

  it('should project a review event onto its stored snapshot', () => {
    const event: ReviewEvent = {
      id: 7,
      itemId: 'item-1',
      reviewedAt: NOW,
      quality: 4,
      easeFactor: 2.36,
      interval: 6,
      repetition: 3,
    };

    expect(stateFromEvent(event)).toEqual({
      itemId: 'item-1',
      easeFactor: 2.36,
      interval: 6,
      repetition: 3,
      lastReviewedAt: NOW,
    });
    expect(deriveState('item-1', event)).toEqual(stateFromEvent(event));
    expect(deriveState('item-1', null)).toEqual(createVirginState('item-1'));
  });

  describe('isDue', () => {
    it('should treat unseen items as due', () => {
      expect(isDue(createVirginState('item-1'), NOW)).toBe(true);
      expect(dueAt(createVirginState('item-1'))).toBeNull();
    });

    it('should become due exactly at last review plus interval', () => {
      const state = reviewed({ interval: 1 });
      expect(dueAt(state)).toEqual(addDays(NOW, 1));
      expect(isDue(state, addDays(NOW, 0.5))).toBe(false);
      expect(isDue(state, addDays(NOW, 1))).toBe(true);
    });

    it('should make a failed card due immediately', () => {
      expect(isDue(reviewed({ interval: 0, repetition: 0 }), NOW)).toBe(true);
    });
  });

  describe('overdueFactor', () => {
    it('should be 1 for unseen or zero-interval cards', () => {
      expect(overdueFactor(createVirginState('item-1'), NOW)).toBe(1.0);
      expect(overdueFactor(reviewed({ interval: 0 }), addDays(NOW, 5))).toBe(1.0);
    });

    it('should report the elapsed-to-interval ratio floored at 1', () => {
      expect(overdueFactor(reviewed({ interval: 2 }), addDays(NOW, 6))).toBe(3);
      expect(overdueFactor(reviewed({ interval: 2 }), addDays(NOW, 1))).toBe(1.0);
    });
  });

  describe('classification', () => {
    it('should mark cards below two repetitions as learning', () => {
      expect(isLearning(reviewed({ repetition: 0 }))).toBe(true);
      expect(isLearning(reviewed({ repetition: 1 }))).toBe(true);
      expect(isLearning(reviewed({ repetition: 2 }))).toBe(false);
    });

    it('should classify by phase', () => {
      expect(classifyCard(createVirginState('item-1'))).toBe('new');
      expect(classifyCard(reviewed({ repetition: 0, interval: 0 }))).toBe('learning');
      expect(classifyCard(reviewed({ repetition: 1 }))).toBe('learning');
      expect(classifyCard(reviewed({ repetition: 4, interval: 15 }))).toBe('review');
    });
  });
});

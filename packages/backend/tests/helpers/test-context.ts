/**
 * 测试上下文：内存 SQLite + 可控时钟 + 可复现随机数
 */

import { addDays } from '@lexiloop/shared';
import { type Lexiloop, type LexiloopOptions, createLexiloop } from '../../src/app';
import { MEMORY_DATABASE } from '../../src/database/sqlite';
import type { RandomSource } from '../../src/utils/random';

export interface TestClock {
  (): Date;
  set(date: Date): void;
  advanceDays(days: number): void;
}

export function createTestClock(start: Date = new Date('2024-06-01T09:00:00.000Z')): TestClock {
  let current = new Date(start.getTime());
  return Object.assign(() => new Date(current.getTime()), {
    set(date: Date) {
      current = new Date(date.getTime());
    },
    advanceDays(days: number) {
      current = addDays(current, days);
    },
  });
}

/**
 * 线性同余随机数，固定种子便于复现
 */
export function createSeededRandom(seed: number = 42): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x1_0000_0000;
  };
}

export interface TestContext {
  app: Lexiloop;
  clock: TestClock;
}

export function createTestContext(options: Omit<LexiloopOptions, 'databasePath' | 'clock'> = {}): TestContext {
  const clock = createTestClock();
  const app = createLexiloop({
    databasePath: MEMORY_DATABASE,
    clock,
    random: createSeededRandom(),
    ...options,
  });
  return { app, clock };
}

/**
 * 按给定评分序列复习一个词条，每次复习前推进 stepDays 天
 */
export async function reviewSequence(
  ctx: TestContext,
  itemId: string,
  qualities: readonly number[],
  stepDays: number = 0,
): Promise<void> {
  for (const quality of qualities) {
    ctx.clock.advanceDays(stepDays);
    await ctx.app.reviews.recordReview(itemId, quality);
  }
}

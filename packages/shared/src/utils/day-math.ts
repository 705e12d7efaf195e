/**
 * 以"天"为单位的时间换算
 * 间隔天数允许小数，这里统一使用毫秒精度
 */

export const MS_PER_DAY = 86_400_000;

export function daysToMs(days: number): number {
  return days * MS_PER_DAY;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + daysToMs(days));
}

/**
 * from 到 to 经过的天数（可为负）
 */
export function daysBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / MS_PER_DAY;
}

/**
 * 本地时区当天零点
 */
export function startOfLocalDay(date: Date): Date {
  const start = new Date(date.getTime());
  start.setHours(0, 0, 0, 0);
  return start;
}

/**
 * 随机工具，random 可注入以便测试
 */

export type RandomSource = () => number;

/**
 * Fisher-Yates 洗牌，返回新数组
 */
export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const tmp = result[i];
    result[i] = result[j];
    result[j] = tmp;
  }
  return result;
}

/**
 * 无放回随机抽取 count 个
 */
export function sample<T>(items: readonly T[], count: number, random: RandomSource = Math.random): T[] {
  return shuffle(items, random).slice(0, Math.max(0, count));
}

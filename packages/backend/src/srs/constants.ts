/**
 * SM-2 调度参数
 */

/** 新卡片的默认难度因子 */
export const DEFAULT_EASE = 2.5;

/** 难度因子下限，防止反复失败的卡片难度因子无限下降 */
export const MIN_EASE = 1.3;

/** 首次答对后的学习步长（天），约 20 分钟，下一个调度周期即可再次出现 */
export const LEARNING_STEP = 0.014;

/** 毕业后的固定间隔（天） */
export const GRADUATION_INTERVAL = 1.0;
export const SECOND_INTERVAL = 6.0;

/** 评分 >= 3 视为答对 */
export const PASSING_QUALITY = 3;

/** 连续失败达到该次数即判定为顽固词 */
export const LEECH_THRESHOLD = 4;

/** 统计连续失败时最多回看的复习记录数 */
export const FAILURE_LOOKBACK = 10;

/** 顽固词候选池相对请求数量的倍数 */
export const LEECH_CANDIDATE_MULTIPLIER = 3;

/** 超期判定：实际间隔超过计划间隔的倍数 */
export const OVERDUE_RATIO_THRESHOLD = 3.0;

/** 严重超期后答对，新间隔最多为原间隔的倍数 */
export const OVERDUE_GROWTH_CAP = 1.2;

/** 近期统计窗口（天） */
export const RECENT_WINDOW_DAYS = 7;

/** 质量趋势判定阈值 */
export const TREND_THRESHOLD = 0.3;

/** 间隔达到该天数视为已掌握 */
export const MASTERED_INTERVAL_DAYS = 21;

/**
 * Services Index
 * 集中导出所有服务
 */

// Catalog
export {
  CatalogService,
  SKIP_FLAG,
  hasFlag,
  normalizeText,
} from './catalog.service';
export type {
  CatalogServiceOptions,
  ExclusionPredicate,
  MarkSkippedResult,
} from './catalog.service';

// Scheduling
export { ReviewService } from './review.service';
export type { ReviewServiceOptions } from './review.service';

export { DueQueryService, DEFAULT_DUE_LIMIT, toScheduledCard } from './due-query.service';
export type { DueQueryServiceOptions } from './due-query.service';

export { LeechService, DEFAULT_LEECH_LIMIT, countConsecutiveFailures } from './leech.service';

// Analysis
export { RetentionService, classifyTrend, meanQuality, ratePct } from './retention.service';
export type { RetentionServiceOptions } from './retention.service';

export { ProgressService, isStruggling, recommend } from './progress.service';
export type { ProgressRecommendation, ProgressSnapshot } from './progress.service';

// Selection
export { WordSelectionService, adjustRecallProbability } from './word-selection.service';
export type {
  SelectForMessageOptions,
  SelectionResult,
  WordSelectionServiceOptions,
} from './word-selection.service';

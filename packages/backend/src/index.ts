export { createLexiloop } from './app';
export type { Lexiloop, LexiloopOptions } from './app';

export { env, envSchema, validateEnv } from './config/env';
export type { Env } from './config/env';

export { MEMORY_DATABASE, migrate, openDatabase } from './database/sqlite';
export type { SqliteDatabase } from './database/sqlite';

export { AppError, InvalidRatingError, ItemNotFoundError, LockTimeoutError } from './errors';
export { createChildLogger, logger } from './logger';

export * from './repositories';
export * from './services';
export * from './srs';

export { KeyedLock } from './utils/keyed-lock';
export { systemClock } from './utils/clock';
export type { Clock } from './utils/clock';
export { sample, shuffle } from './utils/random';
export type { RandomSource } from './utils/random';

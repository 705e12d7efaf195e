export * from './word.schema';
export * from './review.schema';

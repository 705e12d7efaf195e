export * from './types';
export { SqliteItemCatalogRepository } from './sqlite-item-catalog.repository';
export { SqliteReviewLedgerRepository } from './sqlite-review-ledger.repository';

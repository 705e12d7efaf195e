export * from './constants';
export * from './sm2';
export * from './card-state';

export * from './frame';
export type * from './types';

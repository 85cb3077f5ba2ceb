export const name = '@gitremap/repo';

export * from './scanner';

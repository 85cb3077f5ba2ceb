export const name = '@gitremap/shared';

export * from './types/events';
export * from './logger';
export * from './errors';
export * from './fs/io';
export * from './config/schema';

export const name = '@starsift/shared';

export * from './types/events';
export * from './logger';
export * from './errors';
export * from './fs/io';
export * from './config/schema';

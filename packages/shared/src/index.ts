export const name = '@faultline/shared';

export * from './types/events';
export * from './types/harness';
export * from './logger';
export * from './errors';
export * from './fs/path';
export * from './fs/io';
export * from './config/schema';
export * from './test-ids';

export * from './errors';
export * from './logger';
export * from './types/bisect';
export * from './types/events';
export * from './config/schema';
export * from './fs/io';
export * from './fs/path';

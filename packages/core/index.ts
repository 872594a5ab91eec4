// Core module exports

export * from './types';
export * from './errors';
export * from './schemas';
export * from './slot_time';
export * from './slot_keys';
export * from './pricing';
export * from './availability';
export * from './logger';

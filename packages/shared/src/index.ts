export * from './schemas.js';
export * from './eventTime.js';

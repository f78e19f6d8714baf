export * from './errors/index.js';
export * from './cancellation/index.js';
export * from './reconnection-manager/index.js';
export * from './types/index.js';

// Logging with redaction
export * from './logging/index.js';

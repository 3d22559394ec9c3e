export * from './error-codes.js';
export * from './oauth-error.js';
export * from './broker-error.js';
export * from './storage-error.js';

export * from './plan.js';
export * from './user.js';
export * from './alias.js';
export * from './client.js';
export * from './scope.js';
export * from './binding.js';
export * from './token.js';
export * from './account-code.js';
export * from './hono.js';

/**
 * Domain model exports.
 */

export * from './account';
export * from './api-key';
export * from './deployment';
export * from './errors';
export * from './identifiers';
export * from './organization';
export * from './payload';

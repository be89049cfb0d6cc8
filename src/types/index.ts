/**
 * Public type exports.
 */

export * from './exit-codes.js';
export * from './task.js';
export * from './config.js';

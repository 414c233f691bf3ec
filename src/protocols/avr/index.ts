/**
 * Receiver line-protocol exports.
 * @module avr
 */
export * from './constants';
export * from './errors';
export * from './framer';
export * from './parser';
export * from './commands';
export * from './discovery';
export * from './client';

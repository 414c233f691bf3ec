/**
 * Protocol exports.
 * @module protocols
 */
export * from './avr';

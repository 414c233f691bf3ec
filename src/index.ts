/**
 * Receiver control client.
 * @module avr-line-client
 */
export * from './core/logger';
export * from './core/utils';
export * from './core/StateCache';
export * from './core/Zone';
export * from './config/device';
export * from './protocols';

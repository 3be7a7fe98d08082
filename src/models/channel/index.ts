/**
 * @module channel
 * @description Path loss, noise and propagation sample sources
 */

export * from './path-loss';
export * from './propagation';

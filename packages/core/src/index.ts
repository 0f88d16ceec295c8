/**
 * @meshbridge/core: shared types, contracts, errors and utilities.
 * Zero runtime dependencies.
 */

export * from './types/index.js';
export * from './errors/index.js';
export type { IRadioLink, IRadioPort } from './interfaces/radio-link.js';
export type { IObserver } from './interfaces/observer.js';
export * from './utils/index.js';

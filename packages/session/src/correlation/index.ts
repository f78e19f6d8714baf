export { OneShot } from './one-shot.js';
export { TokenSource } from './token-source.js';
export { RequestCorrelator } from './request-correlator.js';
export type { RequestCorrelatorOptions, Transmit } from './request-correlator.js';

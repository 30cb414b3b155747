export { createHash, stableStringify, hashEquals, combineHashes } from './hash';
export { now, backoffDelay, timeout, sleep, debounce, type Debounced } from './time';

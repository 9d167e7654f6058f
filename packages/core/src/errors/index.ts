export { SieveError, toError, formatTrace } from './sieve_error';
export type { SieveErrorCode } from './sieve_error';

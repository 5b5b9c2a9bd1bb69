/**
 * @fileoverview Shared utilities.
 */

export {
  withTimeout,
  timed,
  TimeoutError,
  type WithTimeoutOptions,
  type Timed,
} from './async.js';

export {
  getErrorMessage,
  getErrorName,
  toError,
} from './errors.js';

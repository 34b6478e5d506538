/**
 * Type definitions for msgframe
 */

export {
  ErrorCode,
  getErrorMessage,
  FrameError,
  toTransportError,
  isLengthError,
  isConnectionFatal,
} from './errors.js';

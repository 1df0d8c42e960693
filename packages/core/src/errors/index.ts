export {
  SonarError,
  SonarErrorCode,
  type RecoveryHint,
  type SonarErrorDetails,
} from './sonar-error.js';

export {
  Errors,
  DEFAULT_RETRYABLE_STATUS_CODES,
  extractErrorMessage,
  toSonarError,
} from './factory.js';

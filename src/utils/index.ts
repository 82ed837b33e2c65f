export { errorCode, errorMessage, isMissingPathError } from './fs-errors.js';
export { createLogger, initLogger, type Logger, type LoggerOptions, resetLogger } from './logger.js';
export { createMutex, type Mutex } from './mutex.js';
export { redactSecrets, redactSecretsInRecord, redactSecretsInValue } from './secret-redaction.js';

export * from './audit/index.js';
export * from './config/index.js';
export * from './guardrails/index.js';
export * from './ledger/index.js';
export * from './mediator/index.js';
export * from './permissions/index.js';
export * from './session/index.js';
export * from './shell/index.js';
export * from './tools/index.js';
export { createLogger, initLogger, type Logger, type LoggerOptions, redactSecrets, redactSecretsInValue } from './utils/index.js';

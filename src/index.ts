export * from './discovery/index.js';
export * from './transport/index.js';
export {
  AddressLookupError,
  DiscoveryError,
  HardFailure,
  NoRecordsError,
  PromptFailure,
  ServerConnectError,
  classifyClientFailure,
  formatCliError,
  type ClientFailureKind,
  type HardFailureReason,
} from './errors.js';
export { loadConfig, envSchema, type Config } from './config/schema.js';
export { createLogger, type Logger } from './config/logger.js';

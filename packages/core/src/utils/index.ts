// packages/core/src/utils/index.ts -- barrel re-export

export {
  ConfigError,
  ValidationError,
  ExtractionError,
  ReportError,
  errorMessage,
} from './errors.js';
export type { ValidationCode, ExtractionFailureReason } from './errors.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

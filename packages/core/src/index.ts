// @docsift/core - Document extraction and rate-limit aware analysis

export const VERSION = '0.1.0';

// Type definitions
export type {
  // Config
  ModelConfig,
  AnalysisConfig,
  RetryConfig,
  OutputConfig,
  AdvancedConfig,
  ProjectConfig,
  ConfigOverrides,
  // Analysis
  FormatTag,
  SuccessOutcome,
  BlockedOutcome,
  RateLimitedOutcome,
  TransientErrorOutcome,
  AnalysisOutcome,
  DocumentInfo,
  InvalidInput,
  ExtractionFailed,
  DocumentAnalysis,
  // Events
  AnalysisStartedEvent,
  ExtractionCompletedEvent,
  DocumentTruncatedEvent,
  AttemptStartedEvent,
  AttemptSucceededEvent,
  AttemptBlockedEvent,
  AttemptFailedEvent,
  RetryScheduledEvent,
  RetryTickEvent,
  RetryExhaustedEvent,
  AnalysisEvent,
  // Extraction
  ExtractionResult,
  DocumentExtractor,
  FormatExtractor,
  // Models
  Candidate,
  GenerateResponse,
  RemoteModel,
} from './types/index.js';

// Utilities
export {
  ConfigError,
  ValidationError,
  ExtractionError,
  ReportError,
  errorMessage,
  createLogger,
  silentLogger,
} from './utils/index.js';
export type { ValidationCode, ExtractionFailureReason, Logger, LogLevel } from './utils/index.js';
export {
  DEFAULT_MAX_CHARS,
  TRUNCATION_MARKER,
  DEFAULT_MAX_ATTEMPTS,
  MAX_ATTEMPTS_LIMIT,
  DEFAULT_BACKOFF_BASE_SEC,
  DEFAULT_MODEL,
  DEFAULT_API_KEY_ENV,
  DEFAULT_PRICE_PER_MILLION,
  HTTP_TOO_MANY_REQUESTS,
  RULE_WIDTH,
  RATE_LIMIT_SUGGESTIONS,
} from './utils/constants.js';

// Configuration
export {
  DEFAULT_CONFIG,
  projectConfigSchema,
  validateConfig,
  CONFIG_FILENAME,
  loadConfig,
  writeConfig,
  resolveApiKey,
} from './config/index.js';
export type { ProjectConfigInput } from './config/index.js';

// Extraction
export {
  ExtractorRegistry,
  createDefaultRegistry,
  formatFromPath,
  describeFormat,
  SUPPORTED_EXTENSIONS,
  PlainTextExtractor,
  DocxExtractor,
  SpreadsheetExtractor,
} from './extract/index.js';

// Prompt
export {
  ANALYSIS_SECTIONS,
  DOCUMENT_CONTENT_LABEL,
  truncateDocument,
  buildAnalysisPrompt,
} from './prompts/index.js';
export type { TruncatedText } from './prompts/index.js';

// Engine
export {
  AnalysisController,
  afterCall,
  afterWait,
  begin,
  isTerminal,
  toOutcome,
  waitSecondsFor,
  classifyError,
  EventBus,
  createCountdownWaiter,
  sleep,
} from './engine/index.js';
export type {
  AnalysisControllerOptions,
  AnalysisRequest,
  ControllerSettings,
  BackoffPolicy,
  CallSignal,
  RetryState,
  TerminalState,
  ErrorKind,
  Waiter,
} from './engine/index.js';

// Models
export { GeminiModel, estimateCost, formatCost } from './models/index.js';
export type { GeminiModelOptions, GeminiResponseLike, GenerateContentFn } from './models/index.js';

// Report
export { writeReport, formatReport, reportFileName } from './report/index.js';
export type { ReportOptions } from './report/index.js';

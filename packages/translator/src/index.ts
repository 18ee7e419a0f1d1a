export {
  Translator,
  buildUserAgent,
  isFreeAccountAuthKey,
  SERVER_URL,
  SERVER_URL_FREE,
  type AppInfo,
  type DocumentInput,
  type DocumentTranslateOptions,
  type RephraseTextOptions,
  type TranslateTextOptions,
  type TranslatorOptions,
  type TransportChoice,
} from './translator.js';
export {
  ApiError,
  AuthorizationError,
  ConnectionError,
  DocumentNotReadyError,
  DocumentTranslationError,
  GlossaryNotFoundError,
  QuotaExceededError,
  TooManyRequestsError,
} from './errors.js';
export {
  DocumentHandle,
  DocumentStatus,
  describeGlossary,
  describeUsage,
  removeRegionalVariant,
  type DocumentStatusValue,
  type Formality,
  type GlossaryInfo,
  type GlossaryLanguagePair,
  type Language,
  type ModelType,
  type SplitSentences,
  type TextResult,
  type Usage,
  type UsageDetail,
  type WriteResult,
  type WritingStyle,
  type WritingTone,
} from './api-data.js';
export { convertDictToTsv, convertTsvToDict, validateGlossaryTerm, type GlossaryEntries } from './glossary/entries.js';
export { loadEnvConfig, resolveClientConfig, type ClientConfig, type ClientConfigInput, type EnvConfig } from './config.js';
export { DocumentPoller, DEFAULT_POLL_INTERVAL_MS, type WaitOptions } from './document/document-poller.js';
export { BackoffTimer } from './http/backoff-timer.js';
export { RetryPolicy, type RetryDecision } from './http/retry-policy.js';
export { RequestExecutor, type RequestExecutorOptions, type Sleep } from './http/request-executor.js';
export { raiseForStatus, type InterpretContext } from './http/response-interpreter.js';
export { AxiosTransport, type AxiosTransportOptions } from './http/axios-transport.js';
export { FetchTransport, type FetchTransportOptions } from './http/fetch-transport.js';
export { createRequest, createResponse } from './http/request.js';
export type { HttpRequest, HttpResponse, RequestBody, SendOutcome, Transport } from './http/types.js';
export { RequestMetrics, type MetricSnapshot } from './observability/request-metrics.js';

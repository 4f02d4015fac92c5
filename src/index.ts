export {
  AuthError,
  ConfigurationError,
  type Diagnostics,
  type ErrorCode,
  FormatNotFoundError,
  isLingopipeError,
  LingopipeError,
  MarkersNotFoundError,
  MissingRequiredConfigError,
  type PipelineStage,
  ResponseFormatError,
  ResponseMalformedError,
  TemplateNotFoundError,
  TransportError,
  TruncatedError,
  ValidationError,
  VendorApiError,
} from './lib/errors.js';
export {
  containsPlaceholderSyntax,
  type Filter,
  FilterManager,
  type FilterStats,
  HtmlTagFilter,
  PlaceholderCounter,
  UrlFilter,
} from './lib/filters/index.js';
export {
  FetchHttpClient,
  type FetchHttpClientOptions,
  type HttpClient,
  type HttpRequest,
  type HttpResponse,
} from './lib/http-client.js';
export { createLogger, type Logger } from './lib/logger.js';
export { PromptCatalog, type PromptListing, type PromptTemplates, type PromptVariables } from './lib/prompts/index.js';
export {
  applyAuth,
  type FeedbackLevel,
  translate,
  type TranslateDependencies,
  type TranslateRequest,
  type TranslateResult,
} from './lib/translate.js';
export {
  createDriver,
  type DocumentFormat,
  type DriverOptions,
  type DriverRequest,
  type DriverResponse,
  type ModelConfig,
  type ModelDriver,
  SUPPORTED_VENDORS,
  type Vendor,
} from './lib/translation/index.js';
export { ModelRegistry, type ModelListing } from './lib/translation/model-registry.js';
export { extractUsage, type UsageBreakdown, type UsageResult } from './lib/translation/usage.js';
export {
  HtmlValidator,
  JsonValidator,
  type RepairFeature,
  REPAIR_MISSING_NULLS,
  Schema,
  TextLengthValidator,
  ValidationResult,
} from './lib/validation/index.js';

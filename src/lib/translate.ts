import {
  AuthError,
  ConfigurationError,
  type Diagnostics,
  errorMessage,
  isLingopipeError,
  type PipelineStage,
  TransportError,
  ValidationError,
} from './errors.js';
import { containsPlaceholderSyntax, FilterManager, type FilterStats } from './filters/index.js';
import { FetchHttpClient, type HttpClient, type HttpResponse, maskSecrets } from './http-client.js';
import { type Logger, logger as defaultLogger } from './logger.js';
import type { PromptCatalog } from './prompts/prompt-catalog.js';
import type { ModelRegistry } from './translation/model-registry.js';
import { type DocumentFormat, type DriverRequest, isDocumentFormat, type ModelConfig } from './translation/types.js';
import { extractUsage, type UsageResult } from './translation/usage.js';
import {
  HtmlValidator,
  type JsonValue,
  JsonValidator,
  type RepairFeature,
  Schema,
  type SchemaNode,
  TextLengthValidator,
} from './validation/index.js';

export type FeedbackLevel = 'info' | 'warning' | 'error';

export interface TranslateRequest {
  text: string;
  /** Registry key, e.g. `openai:gpt-4o` */
  modelKey: string;
  format: DocumentFormat | string;
  apiKey: string;
  /** Filter identifiers applied in order (`url`, `html_pre`, ...) */
  filters?: string[];
  /** Build everything but skip the HTTP call; the masked text stands in for the translation */
  dryRun?: boolean;
  verbose?: boolean;
  context?: string | null;
  promptKey?: string;
  sourceLang?: string | null;
  targetLang?: string | null;
  /** Per-call model variables such as `folder_id` */
  variables?: Record<string, string>;
  proxy?: string | null;
  /** Syntax, schema and length checks (default true) */
  validate?: boolean;
  repairs?: RepairFeature[];
  onFeedback?: (message: string, level: FeedbackLevel) => void;
}

export interface TranslateDependencies {
  registry: ModelRegistry;
  prompts: PromptCatalog;
  httpClient?: HttpClient;
  logger?: Logger;
}

export interface TranslateResult {
  original: string;
  prepared: string;
  result: string;
  httpStatus: number;
  debugRequest: string;
  debugResponse: string;
  rawResponseBody: string;
  consumed: UsageResult;
  lengths: {
    original: number;
    prepared: number;
    translated: number;
  };
  filterStats: FilterStats[];
}

const SCHEMA_CAPTURED = '[JSON schema captured]';
const SCHEMA_VALIDATED = '[JSON schema validated]';
const SCHEMA_REPAIRED = '[JSON schema repaired]';

function charLength(text: string): number {
  return [...text].length;
}

function appendMarker(debug: string, marker: string): string {
  return `${debug}${marker}\n`;
}

function hasHeader(headers: readonly string[], name: string): boolean {
  const prefix = `${name.toLowerCase()}:`;
  return headers.some((header) => header.trim().toLowerCase().startsWith(prefix));
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(text: string): JsonValue {
  const value: JsonValue = JSON.parse(text);
  return value;
}

/**
 * Place the API key where the model's `requirements.auth` says and make sure a
 * Content-Type header matching the body type is present.
 */
export function applyAuth(model: ModelConfig, request: DriverRequest, apiKey: string): DriverRequest {
  const auth = model.requirements?.auth ?? {};
  const bodyType = model.requirements?.body_type ?? 'json';
  let { url, body } = request;
  const headers = [...request.headers];

  switch (auth.type ?? 'header') {
    case 'header': {
      const prefix = auth.prefix ? `${auth.prefix} ` : '';
      headers.push(`${auth.key_name ?? 'Authorization'}: ${prefix}${apiKey}`);
      break;
    }
    case 'form': {
      const field = auth.key_name ?? 'auth_key';
      if (bodyType === 'json') {
        const payload = body.trim() === '' ? {} : parseJson(body);
        if (!isJsonObject(payload)) {
          throw new ConfigurationError(`Cannot add field '${field}' to a non-object JSON body`);
        }
        body = JSON.stringify({ ...payload, [field]: apiKey });
      } else {
        const pair = `${encodeURIComponent(field)}=${encodeURIComponent(apiKey)}`;
        body = body === '' ? pair : `${body}&${pair}`;
      }
      break;
    }
    case 'query': {
      const pair = `${encodeURIComponent(auth.key_name ?? 'key')}=${encodeURIComponent(apiKey)}`;
      url = `${url}${url.includes('?') ? '&' : '?'}${pair}`;
      break;
    }
  }

  if (!hasHeader(headers, 'Content-Type')) {
    headers.push(
      bodyType === 'form' ? 'Content-Type: application/x-www-form-urlencoded' : 'Content-Type: application/json',
    );
  }

  return { url, headers, body };
}

/**
 * Run one document through the pipeline:
 * pre-validate, mask, build request, authenticate, transmit, parse response,
 * unmask, post-validate and normalize usage.
 *
 * Any failure aborts the run with a typed error whose `diagnostics` hold what
 * was gathered up to that stage.
 *
 * @example
 * ```ts
 * const res = await translate(
 *   { text: 'Hello https://example.com', modelKey: 'deepl:free', format: 'text', apiKey, filters: ['url'] },
 *   { registry: ModelRegistry.loadDefault(), prompts: PromptCatalog.loadDefault() },
 * );
 * console.log(res.result);
 * ```
 */
export async function translate(request: TranslateRequest, deps: TranslateDependencies): Promise<TranslateResult> {
  const log = deps.logger ?? defaultLogger;
  const http = deps.httpClient ?? new FetchHttpClient();
  const { text, modelKey } = request;
  const dryRun = request.dryRun ?? false;
  const verbose = request.verbose ?? false;
  const validate = request.validate ?? true;
  const repairs = request.repairs ?? [];

  const diagnostics: Diagnostics = { stage: 'start', modelKey };
  const enter = (stage: PipelineStage): void => {
    diagnostics.stage = stage;
    log.debug({ modelKey, stage }, 'pipeline stage');
  };
  const feedback = (message: string, level: FeedbackLevel = 'info'): void => {
    request.onFeedback?.(message, level);
  };

  try {
    if (!deps.registry.has(modelKey)) {
      throw new ConfigurationError(`Unknown model key: ${modelKey}`);
    }
    const model = deps.registry.get(modelKey);
    if (!model.endpoint) {
      throw new ConfigurationError(`Model ${modelKey} missing required configuration.`);
    }
    const format = request.format;
    if (!isDocumentFormat(format)) {
      throw new ConfigurationError(`Invalid format: '${format}'. Allowed: text, html, json.`);
    }
    if (request.apiKey.trim() === '') {
      throw new AuthError(`API key is required for ${modelKey}`);
    }
    const driver = deps.registry.getDriver(modelKey, deps.prompts);

    // Pre-validate
    enter('pre-validate');
    let schemaBefore: SchemaNode | null = null;
    let jsonBefore: JsonValue | null = null;
    if (validate && format === 'json') {
      const syntax = new JsonValidator().validateSync(text);
      if (!syntax.isValid()) {
        throw new ValidationError('JSON validation failed before translation', syntax.getErrors());
      }
      jsonBefore = parseJson(text);
      schemaBefore = Schema.capture(jsonBefore);
    } else if (validate && format === 'html') {
      const syntax = await new HtmlValidator().validate(text);
      if (!syntax.isValid()) {
        throw new ValidationError('HTML validation failed before translation', syntax.getErrors());
      }
    }

    // Mask
    enter('mask');
    const filters = new FilterManager(request.filters ?? []);
    const filterNames = filters.names().join(', ');
    if (filters.size > 0 && containsPlaceholderSyntax(text)) {
      throw new ValidationError('Input cannot be masked safely', [
        `Text already contains @@N@@ placeholder sequences; filters ${filterNames} cannot restore it unambiguously`,
      ]);
    }
    const prepared = filters.apply(text);
    diagnostics.preparedLength = charLength(prepared);
    // Tokens can fuse with adjacent `@@`/digits into other tokens
    if (filters.size > 0 && filters.restore(prepared) !== text) {
      throw new ValidationError('Input cannot be masked safely', [
        `Masked text does not restore to the input; placeholder-like characters next to spans masked by ${filterNames}`,
      ]);
    }
    if (validate) {
      const length = TextLengthValidator.fromModelConfig(model).validateSync(prepared);
      if (!length.isValid()) {
        throw new ValidationError('Prepared text exceeds model limits', length.getErrors());
      }
    }
    feedback(`Prepared ${diagnostics.preparedLength} chars with ${filters.placeholdersIssued} placeholder(s)`);

    // Build request
    enter('build-request');
    const driverRequest = driver.buildRequest(model, prepared, {
      format,
      ...(request.promptKey !== undefined ? { promptKey: request.promptKey } : {}),
      context: request.context ?? null,
      sourceLang: request.sourceLang ?? null,
      targetLang: request.targetLang ?? null,
      variables: request.variables ?? {},
    });

    // Authenticate
    enter('authenticate');
    const wire = applyAuth(model, driverRequest, request.apiKey);
    const maskPatterns = [...new Set([request.apiKey, encodeURIComponent(request.apiKey)])];

    // Transmit
    enter('transmit');
    feedback(dryRun ? 'Dry run: request not sent' : `Sending request to ${driver.name}`);
    let response: HttpResponse;
    try {
      response = await http.request({
        method: 'POST',
        url: wire.url,
        body: wire.body,
        headers: wire.headers,
        maskPatterns,
        proxy: request.proxy ?? null,
        dryRun,
        verbose,
      });
    } catch (error) {
      throw isLingopipeError(error)
        ? error
        : new TransportError(`Network error: ${errorMessage(error)}`, { cause: error });
    }

    let debugRequest = response.debugRequest;
    let debugResponse = response.debugResponse;
    if (verbose && schemaBefore !== null) {
      debugRequest = appendMarker(debugRequest, SCHEMA_CAPTURED);
    }
    diagnostics.httpStatus = response.status;
    diagnostics.debugRequest = debugRequest;
    diagnostics.debugResponse = debugResponse;
    diagnostics.rawResponseBody = response.body;

    if (!dryRun && response.status >= 400) {
      const maskedBody = maskSecrets(response.body, maskPatterns);
      diagnostics.rawResponseBody = maskedBody;
      const transportError = new TransportError(`HTTP ${response.status} from ${modelKey}: ${maskedBody}`, {
        status: response.status,
        body: maskedBody,
      });
      if (model.http_error_handling) {
        enter('parse-response');
        // Expected to throw the vendor's own error
        driver.parseResponse(model, response.body);
      }
      throw transportError;
    }

    // Parse response
    enter('parse-response');
    const parsed = dryRun ? { text: prepared, usage: null } : driver.parseResponse(model, response.body);

    // Unmask
    enter('unmask');
    let result = filters.restore(parsed.text);

    // Post-validate
    enter('post-validate');
    if (validate && format === 'json' && schemaBefore !== null && jsonBefore !== null) {
      const syntax = new JsonValidator().validateSync(result);
      if (!syntax.isValid()) {
        throw new ValidationError('JSON validation failed after translation', syntax.getErrors());
      }
      const jsonAfter = parseJson(result);
      if (repairs.length > 0) {
        const repaired = Schema.applyRepairs(jsonBefore, jsonAfter, repairs);
        if (JSON.stringify(repaired) !== JSON.stringify(jsonAfter)) {
          result = JSON.stringify(repaired, null, 2);
          if (verbose) {
            debugResponse = appendMarker(debugResponse, SCHEMA_REPAIRED);
          }
          feedback('Restored missing null values in translated JSON', 'warning');
        }
      }
      const schema = Schema.validate(schemaBefore, Schema.capture(parseJson(result)));
      if (!schema.isValid()) {
        throw new ValidationError('JSON schema mismatch after translation', schema.getErrors());
      }
      if (verbose) {
        debugResponse = appendMarker(debugResponse, SCHEMA_VALIDATED);
      }
      diagnostics.debugResponse = debugResponse;
    } else if (validate && format === 'html') {
      const syntax = await new HtmlValidator().validate(result);
      if (!syntax.isValid()) {
        throw new ValidationError('HTML validation failed after translation', syntax.getErrors());
      }
    }

    // Normalize usage
    enter('normalize-usage');
    const consumed = extractUsage(model, parsed.usage);

    return {
      original: text,
      prepared,
      result,
      httpStatus: response.status,
      debugRequest,
      debugResponse,
      rawResponseBody: response.body,
      consumed,
      lengths: {
        original: charLength(text),
        prepared: charLength(prepared),
        translated: charLength(result),
      },
      filterStats: filters.getStats(),
    };
  } catch (error) {
    if (isLingopipeError(error)) {
      error.withDiagnostics({ ...diagnostics });
      log.warn(
        { modelKey, stage: diagnostics.stage, code: error.code, preparedLength: diagnostics.preparedLength },
        'translation failed',
      );
      feedback(error.message, 'error');
    }
    throw error;
  }
}

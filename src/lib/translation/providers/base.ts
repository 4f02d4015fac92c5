import { MarkersNotFoundError, MissingRequiredConfigError, ResponseMalformedError } from '../../errors.js';
import type { PromptCatalog } from '../../prompts/prompt-catalog.js';
import type {
  DocumentFormat,
  DriverOptions,
  DriverRequest,
  DriverResponse,
  ModelConfig,
  ModelDriver,
  Vendor,
} from '../types.js';

export const START_MARKER = '‹‹TRANSLATION››';
export const END_MARKER = '‹‹END››';

const DEFAULT_PROMPT_KEY = 'translator';

const MARKED_SPAN = new RegExp(`${escapeRegExp(START_MARKER)}(.*?)${escapeRegExp(END_MARKER)}`, 's');

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function wrapInMarkers(text: string): string {
  return `${START_MARKER}\n${text}\n${END_MARKER}`;
}

/**
 * Return the trimmed text between the first START/END pair. A reply without
 * the pair is an error, never passed through as unmarked text.
 */
export function extractBetweenMarkers(content: string, vendorName: string): string {
  const match = MARKED_SPAN.exec(content);
  if (!match || match[1] === undefined) {
    throw new MarkersNotFoundError(vendorName);
  }
  return match[1].trim();
}

/** Decode a response body that must be a JSON object. */
export function decodeJsonObject(responseBody: string): unknown {
  let data: unknown;
  try {
    data = JSON.parse(responseBody);
  } catch {
    throw new ResponseMalformedError(`Invalid JSON response: ${responseBody}`);
  }
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ResponseMalformedError(`Invalid JSON response: ${responseBody}`);
  }
  return data;
}

export function configHeaders(config: ModelConfig): string[] {
  return [...(config.requirements?.headers ?? [])];
}

export function resolveFormat(config: ModelConfig, options: DriverOptions): DocumentFormat {
  if (options.format) {
    return options.format;
  }
  const fallback = config.defaults?.format ?? config.format;
  return fallback === 'html' || fallback === 'json' ? fallback : 'text';
}

export interface ChatSettings {
  format: DocumentFormat;
  sourceLang: string;
  targetLang: string;
  temperature: number;
  systemPrompt: string;
}

/**
 * Shared request plumbing for chat vendors that follow the marker protocol:
 * option/default resolution and system prompt rendering.
 */
export abstract class MarkerDriver implements ModelDriver {
  abstract readonly name: string;
  abstract readonly vendor: Vendor;
  readonly usesMarkers = true;

  constructor(protected readonly prompts: PromptCatalog) {}

  abstract buildRequest(config: ModelConfig, text: string, options: DriverOptions): DriverRequest;
  abstract parseResponse(config: ModelConfig, responseBody: string): DriverResponse;

  /** Vendor label used in configuration errors. */
  protected get configLabel(): string {
    return this.name;
  }

  protected requireModel(config: ModelConfig): string {
    const model = config.defaults?.model;
    if (!model) {
      throw new MissingRequiredConfigError(`Missing ${this.configLabel} model name`);
    }
    return model;
  }

  protected chatSettings(config: ModelConfig, options: DriverOptions): ChatSettings {
    const defaults = config.defaults ?? {};
    const format = resolveFormat(config, options);
    const sourceLang = options.sourceLang || defaults.source_lang || 'auto';
    const targetLang = options.targetLang || defaults.target_lang || 'EN';
    const temperature = options.temperature ?? defaults.temperature ?? 0;
    const context = (options.context ?? defaults.context ?? '').trim();

    const systemPrompt = this.prompts.render(options.promptKey ?? DEFAULT_PROMPT_KEY, format, {
      source: sourceLang,
      target: targetLang,
      start: START_MARKER,
      end: END_MARKER,
      context: context !== '' ? `Context: ${context}` : '',
    });

    return { format, sourceLang, targetLang, temperature, systemPrompt };
  }
}

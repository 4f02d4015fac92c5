import { z } from 'zod';

/**
 * Supported vendors.
 * - Chat LLMs (openai, anthropic, google, xai, yandex) follow the marker protocol
 * - Field-style MT (deepl) takes text and language as separate request fields
 */
export type Vendor =
  | 'openai' // OpenAI chat completions
  | 'anthropic' // Claude Messages API
  | 'google' // Gemini generateContent
  | 'xai' // Grok chat completions
  | 'yandex' // Yandex Foundation Models
  | 'deepl'; // DeepL v2 translate

export type DocumentFormat = 'text' | 'html' | 'json';

export const DOCUMENT_FORMATS: readonly DocumentFormat[] = ['text', 'html', 'json'];

export function isDocumentFormat(value: string): value is DocumentFormat {
  return DOCUMENT_FORMATS.some((format) => format === value);
}

const authSchema = z.object({
  type: z.enum(['header', 'form', 'query']).optional(),
  key_name: z.string().optional(),
  prefix: z.string().nullish(),
  env: z.string().optional(),
  help_url: z.string().optional(),
});

const usageCategorySchema = z.object({
  total: z.string().optional(),
  breakdown: z.record(z.string()).optional(),
});

export const modelConfigSchema = z.object({
  vendor: z.string().min(1),
  name: z.string().optional(),
  endpoint: z.string().optional(),
  format: z.string().optional(),
  defaults: z
    .object({
      model: z.string(),
      temperature: z.number(),
      source_lang: z.string(),
      target_lang: z.string(),
      max_tokens: z.number().int(),
      formality: z.string(),
      context: z.string(),
      format: z.string(),
      candidateCount: z.number().int(),
      maxOutputTokens: z.number().int().nullable(),
      thinkingBudget: z.number().int().nullable(),
      includeThoughts: z.boolean().nullable(),
    })
    .partial()
    .optional(),
  requirements: z
    .object({
      auth: authSchema.optional(),
      headers: z.array(z.string()).optional(),
      body_type: z.enum(['json', 'form']).optional(),
      variables: z.record(z.string()).optional(),
    })
    .optional(),
  limits: z
    .object({
      estimated_max_chars: z.number().int().nonnegative(),
      max_tokens: z.number().int().nonnegative(),
      max_output_tokens: z.number().int().nonnegative(),
      token_estimator: z.string(),
    })
    .partial()
    .optional(),
  usage: z.record(usageCategorySchema).optional(),
  http_error_handling: z.boolean().optional(),
  notes: z.string().optional(),
});

/** One flattened registry entry, e.g. `openai:gpt-4o`. */
export type ModelConfig = z.infer<typeof modelConfigSchema>;
export type AuthRequirement = z.infer<typeof authSchema>;
export type UsageSpec = NonNullable<ModelConfig['usage']>;

/**
 * Per-call options handed to a driver. Anything left out falls back to the
 * model's `defaults`.
 */
export interface DriverOptions {
  format?: DocumentFormat;
  /** Prompt group in prompts.yaml (default `translator`) */
  promptKey?: string;
  /** Extra context appended to the system prompt */
  context?: string | null;
  sourceLang?: string | null;
  targetLang?: string | null;
  temperature?: number;
  maxTokens?: number;
  /** Model-specific variables such as Yandex's `folder_id` */
  variables?: Record<string, string>;
}

/** Wire request produced by a driver, before credentials are injected. */
export interface DriverRequest {
  url: string;
  /** `Name: value` lines */
  headers: string[];
  body: string;
}

export interface DriverResponse {
  /** Translated text, still masked */
  text: string;
  /** Vendor usage payload, untouched until normalized */
  usage: Record<string, unknown> | null;
}

/**
 * One implementation per vendor. Drivers are stateless: configuration comes in
 * with every call.
 */
export interface ModelDriver {
  /** Human-readable vendor name used in error messages */
  readonly name: string;
  readonly vendor: Vendor;
  /** Whether responses are wrapped in START/END markers */
  readonly usesMarkers: boolean;

  /**
   * Build the wire request for already-masked text.
   * @throws MissingRequiredConfigError when the model name or a required variable is absent
   */
  buildRequest(config: ModelConfig, text: string, options: DriverOptions): DriverRequest;

  /**
   * Extract the translated text from a raw response body.
   * @throws VendorApiError, ResponseMalformedError, TruncatedError or MarkersNotFoundError
   */
  parseResponse(config: ModelConfig, responseBody: string): DriverResponse;
}

import { z } from 'zod';
import { ResponseMalformedError, VendorApiError } from '../../errors.js';
import type { DriverOptions, DriverRequest, DriverResponse, ModelConfig, ModelDriver } from '../types.js';
import { configHeaders, decodeJsonObject, resolveFormat } from './base.js';

/** JSON punctuation rewritten as self-closing pseudo-tags so DeepL leaves it alone. */
const JSON_PROTECT: Record<string, string> = {
  '{': '<jlc/>',
  '}': '<jrc/>',
  '[': '<jlb/>',
  ']': '<jrb/>',
  ':': '<jcol/>',
  ',': '<jcomma/>',
  '"': '<jqt/>',
};

const JSON_RESTORE: Record<string, string> = Object.fromEntries(
  Object.entries(JSON_PROTECT).map(([char, tag]) => [tag, char]),
);

const PROTECTED_CHARS = /[{}[\]:,"]/g;
const PSEUDO_TAGS = /<(?:jlc|jrc|jlb|jrb|jcol|jcomma|jqt)\/>/g;

export function protectJson(text: string): string {
  return text.replace(PROTECTED_CHARS, (char) => JSON_PROTECT[char] ?? char);
}

export function restoreJson(text: string): string {
  return text.replace(PSEUDO_TAGS, (tag) => JSON_RESTORE[tag] ?? tag);
}

const deeplResponseSchema = z.object({
  message: z.string().optional(),
  translations: z
    .array(
      z.object({
        text: z.unknown(),
        detected_source_language: z.string().optional(),
      }),
    )
    .optional(),
});

/**
 * Driver for DeepL's v2 `translate` endpoint.
 *
 * DeepL is a field-style MT service: no prompt, no markers. Languages and
 * context go in dedicated form fields.
 */
export class DeepLDriver implements ModelDriver {
  readonly name = 'DeepL';
  readonly vendor = 'deepl';
  readonly usesMarkers = false;

  buildRequest(config: ModelConfig, text: string, options: DriverOptions): DriverRequest {
    const defaults = config.defaults ?? {};
    const format = resolveFormat(config, options);

    const payload = new URLSearchParams({
      text: format === 'json' ? protectJson(text) : text,
      target_lang: options.targetLang || defaults.target_lang || 'EN',
      formality: defaults.formality ?? 'prefer_more',
    });

    const sourceLang = options.sourceLang || defaults.source_lang;
    if (sourceLang && sourceLang.toLowerCase() !== 'auto') {
      payload.set('source_lang', sourceLang);
    }
    const context = (options.context ?? defaults.context ?? '').trim();
    if (context !== '') {
      payload.set('context', context);
    }
    if (format === 'html' || format === 'json') {
      payload.set('tag_handling', 'html');
      payload.set('preserve_formatting', '1');
      payload.set('outline_detection', '1');
    }

    return {
      url: config.endpoint ?? '',
      headers: configHeaders(config),
      body: payload.toString(),
    };
  }

  parseResponse(_config: ModelConfig, responseBody: string): DriverResponse {
    const parsed = deeplResponseSchema.safeParse(decodeJsonObject(responseBody));
    if (!parsed.success) {
      throw new ResponseMalformedError(`DeepL translation failed: ${responseBody}`);
    }
    const data = parsed.data;

    const text = data.translations?.[0]?.text;
    if (typeof text !== 'string') {
      if (data.message) {
        throw new VendorApiError('deepl', `DeepL API error: ${data.message}`);
      }
      throw new ResponseMalformedError(`DeepL translation failed: ${responseBody}`);
    }

    // DeepL reports billed characters on a separate endpoint
    return { text: restoreJson(text), usage: null };
  }
}

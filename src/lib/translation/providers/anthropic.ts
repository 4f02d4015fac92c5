import { z } from 'zod';
import { ResponseMalformedError, TruncatedError, VendorApiError } from '../../errors.js';
import type { DriverOptions, DriverRequest, DriverResponse, ModelConfig } from '../types.js';
import { configHeaders, decodeJsonObject, extractBetweenMarkers, MarkerDriver, wrapInMarkers } from './base.js';

const DEFAULT_MAX_TOKENS = 1000;

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string;
}

const anthropicResponseSchema = z.object({
  id: z.string().optional(),
  type: z.string().optional(),
  content: z
    .array(
      z.object({
        type: z.string(),
        text: z.string().optional(),
      }),
    )
    .optional(),
  stop_reason: z.string().nullish(),
  usage: z.record(z.unknown()).nullish(),
  error: z
    .object({
      type: z.string().optional(),
      message: z.string().optional(),
    })
    .nullish(),
});

/**
 * Driver for Anthropic's Messages API.
 *
 * The rendered prompt travels in the top-level `system` field; the masked text
 * is the single user message.
 */
export class AnthropicDriver extends MarkerDriver {
  readonly name = 'Anthropic';
  readonly vendor = 'anthropic';

  buildRequest(config: ModelConfig, text: string, options: DriverOptions): DriverRequest {
    const model = this.requireModel(config);
    const { systemPrompt, temperature } = this.chatSettings(config, options);

    const messages: AnthropicMessage[] = [{ role: 'user', content: wrapInMarkers(text) }];

    return {
      url: config.endpoint ?? '',
      headers: configHeaders(config),
      body: JSON.stringify({
        model,
        system: systemPrompt,
        messages,
        max_tokens: options.maxTokens ?? config.defaults?.max_tokens ?? DEFAULT_MAX_TOKENS,
        temperature,
      }),
    };
  }

  parseResponse(_config: ModelConfig, responseBody: string): DriverResponse {
    const parsed = anthropicResponseSchema.safeParse(decodeJsonObject(responseBody));
    if (!parsed.success) {
      throw new ResponseMalformedError(`Anthropic translation failed: ${responseBody}`);
    }
    const data = parsed.data;

    if (data.error) {
      const message = data.error.message ?? data.error.type ?? 'Unknown error';
      if (message.includes('max_tokens')) {
        throw new VendorApiError(
          'anthropic',
          `Requested max_tokens exceeds model limit. Please reduce to at most the allowed number.\n\nResponse: ${message}`,
        );
      }
      throw new VendorApiError('anthropic', `Anthropic API error: ${message}`);
    }

    if (!data.content) {
      throw new ResponseMalformedError(`Anthropic translation failed: ${responseBody}`);
    }
    const content = data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');

    if (data.stop_reason === 'max_tokens') {
      throw new TruncatedError(
        'Anthropic: translation was truncated (stop_reason=max_tokens); increase max_tokens or split input.',
      );
    }

    return {
      text: extractBetweenMarkers(content, this.name),
      usage: data.usage ?? null,
    };
  }
}

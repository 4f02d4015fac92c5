import { z } from 'zod';
import { ResponseMalformedError, TruncatedError, VendorApiError } from '../../errors.js';
import type { DriverOptions, DriverRequest, DriverResponse, ModelConfig } from '../types.js';
import { configHeaders, decodeJsonObject, extractBetweenMarkers, MarkerDriver, wrapInMarkers } from './base.js';

interface OpenAIChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

const openAIChatResponseSchema = z.object({
  id: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.unknown() }).partial().optional(),
        finish_reason: z.string().nullish(),
      }),
    )
    .optional(),
  usage: z.record(z.unknown()).nullish(),
  error: z
    .object({
      message: z.string().optional(),
      type: z.string().optional(),
      code: z.union([z.string(), z.number()]).nullish(),
    })
    .nullish(),
});

/**
 * Driver for OpenAI's chat completions API.
 *
 * The system prompt comes from the prompt catalog; the masked text goes in the
 * user message between START/END markers.
 */
export class OpenAIDriver extends MarkerDriver {
  readonly name = 'OpenAI';
  readonly vendor = 'openai';

  buildRequest(config: ModelConfig, text: string, options: DriverOptions): DriverRequest {
    const model = this.requireModel(config);
    const { systemPrompt, temperature } = this.chatSettings(config, options);

    const messages: OpenAIChatMessage[] = [
      { role: 'system', content: systemPrompt },
      { role: 'user', content: wrapInMarkers(text) },
    ];

    return {
      url: config.endpoint ?? '',
      headers: configHeaders(config),
      body: JSON.stringify({
        model,
        messages,
        temperature,
        ...(options.maxTokens !== undefined ? { max_tokens: options.maxTokens } : {}),
      }),
    };
  }

  parseResponse(_config: ModelConfig, responseBody: string): DriverResponse {
    const parsed = openAIChatResponseSchema.safeParse(decodeJsonObject(responseBody));
    if (!parsed.success) {
      throw new ResponseMalformedError(`OpenAI translation failed: ${responseBody}`);
    }
    const data = parsed.data;

    if (data.error) {
      throw new VendorApiError('openai', `OpenAI error: ${data.error.message ?? data.error.type ?? 'Unknown error'}`);
    }

    const first = data.choices?.[0];
    const content = first?.message?.content;
    if (typeof content !== 'string') {
      throw new ResponseMalformedError(`OpenAI translation failed: ${responseBody}`);
    }

    if (first?.finish_reason === 'length') {
      throw new TruncatedError(
        'OpenAI: translation was truncated (finish_reason=length); increase max tokens or split input.',
      );
    }

    return {
      text: extractBetweenMarkers(content, this.name),
      usage: data.usage ?? null,
    };
  }
}

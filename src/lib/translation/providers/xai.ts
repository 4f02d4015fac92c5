import { z } from 'zod';
import { ResponseMalformedError, TruncatedError, VendorApiError } from '../../errors.js';
import type { DriverOptions, DriverRequest, DriverResponse, ModelConfig } from '../types.js';
import { configHeaders, decodeJsonObject, extractBetweenMarkers, MarkerDriver, wrapInMarkers } from './base.js';

const grokResponseSchema = z.object({
  code: z.string().optional(),
  error: z.union([z.string(), z.record(z.unknown())]).optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.unknown() }).partial().optional(),
        finish_reason: z.string().nullish(),
      }),
    )
    .optional(),
  usage: z.record(z.unknown()).nullish(),
});

/** Driver for xAI's OpenAI-compatible chat completions (Grok). */
export class XaiDriver extends MarkerDriver {
  readonly name = 'Grok';
  readonly vendor = 'xai';

  protected override get configLabel(): string {
    return 'xAI';
  }

  buildRequest(config: ModelConfig, text: string, options: DriverOptions): DriverRequest {
    const model = this.requireModel(config);
    const { systemPrompt, temperature } = this.chatSettings(config, options);

    return {
      url: config.endpoint ?? '',
      headers: configHeaders(config),
      body: JSON.stringify({
        model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: wrapInMarkers(text) },
        ],
        temperature,
        stream: false,
        ...(options.maxTokens !== undefined ? { max_tokens: options.maxTokens } : {}),
      }),
    };
  }

  parseResponse(_config: ModelConfig, responseBody: string): DriverResponse {
    const parsed = grokResponseSchema.safeParse(decodeJsonObject(responseBody));
    if (!parsed.success) {
      throw new ResponseMalformedError(`Grok translation failed: ${responseBody}`);
    }
    const data = parsed.data;

    if (data.error !== undefined) {
      const message = typeof data.error === 'string' ? data.error : JSON.stringify(data.error);
      throw new VendorApiError('xai', `Grok API error [${data.code ?? 'unknown_error'}]: ${message}`);
    }

    const first = data.choices?.[0];
    const content = first?.message?.content;
    if (typeof content !== 'string') {
      throw new ResponseMalformedError(`Grok translation failed: ${responseBody}`);
    }

    if (first?.finish_reason === 'length') {
      throw new TruncatedError(
        'Grok: translation was truncated (finish_reason=length); increase max_tokens or split input.',
      );
    }

    return {
      text: extractBetweenMarkers(content, this.name),
      usage: data.usage ?? null,
    };
  }
}

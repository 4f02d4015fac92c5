import { z } from 'zod';
import { MissingRequiredConfigError, ResponseMalformedError, TruncatedError, VendorApiError } from '../../errors.js';
import type { DriverOptions, DriverRequest, DriverResponse, ModelConfig } from '../types.js';
import { configHeaders, decodeJsonObject, extractBetweenMarkers, MarkerDriver, wrapInMarkers } from './base.js';

const yandexResponseSchema = z.object({
  error: z
    .object({
      message: z.string().optional(),
      httpCode: z.number().optional(),
      httpStatus: z.string().optional(),
    })
    .passthrough()
    .optional(),
  result: z
    .object({
      alternatives: z
        .array(
          z.object({
            message: z.object({ text: z.unknown() }).partial().optional(),
            status: z.string().optional(),
          }),
        )
        .optional(),
      usage: z.record(z.unknown()).nullish(),
    })
    .optional(),
  completions: z.array(z.object({ text: z.unknown() }).partial()).optional(),
});

type YandexError = NonNullable<z.infer<typeof yandexResponseSchema>['error']>;

function classifyError(error: YandexError): VendorApiError {
  const message = error.message ?? JSON.stringify(error);
  const code = error.httpCode;

  if (code === 400 && message.toLowerCase().includes('folder id')) {
    return new VendorApiError('yandex', `Yandex API folder-id mismatch: ${message}`);
  }
  if (code === 401 || error.httpStatus?.toLowerCase().includes('unauthorized')) {
    return new VendorApiError('yandex', `Yandex API authentication error: ${message}`);
  }
  if (code === 500) {
    return new VendorApiError('yandex', `Yandex API internal server error: ${message}`);
  }
  const codePart = code ? ` (HTTP ${code})` : '';
  return new VendorApiError('yandex', `Yandex API error${codePart}: ${message}`);
}

/**
 * Driver for Yandex Foundation Models (`completion` endpoint).
 *
 * Needs the per-call `folder_id` variable to address the model as
 * `gpt://<folder_id>/<model>`.
 */
export class YandexDriver extends MarkerDriver {
  readonly name = 'Yandex';
  readonly vendor = 'yandex';

  buildRequest(config: ModelConfig, text: string, options: DriverOptions): DriverRequest {
    const folderId = options.variables?.folder_id;
    if (!folderId) {
      throw new MissingRequiredConfigError('Missing Yandex folder_id in options');
    }
    const model = this.requireModel(config);
    const { systemPrompt, temperature } = this.chatSettings(config, options);

    return {
      url: config.endpoint ?? '',
      headers: configHeaders(config),
      body: JSON.stringify({
        modelUri: `gpt://${folderId}/${model}`,
        completionOptions: {
          stream: false,
          temperature,
          maxTokens: options.maxTokens ?? config.defaults?.max_tokens ?? 0,
        },
        messages: [
          { role: 'system', text: systemPrompt },
          { role: 'user', text: wrapInMarkers(text) },
        ],
      }),
    };
  }

  parseResponse(_config: ModelConfig, responseBody: string): DriverResponse {
    const parsed = yandexResponseSchema.safeParse(decodeJsonObject(responseBody));
    if (!parsed.success) {
      throw new ResponseMalformedError(`Yandex translation failed: ${responseBody}`);
    }
    const data = parsed.data;

    if (data.error) {
      throw classifyError(data.error);
    }

    const alternative = data.result?.alternatives?.[0];
    const content = alternative?.message?.text ?? data.completions?.[0]?.text;
    if (typeof content !== 'string') {
      throw new ResponseMalformedError(`Yandex translation failed: ${responseBody}`);
    }

    if (alternative?.status === 'ALTERNATIVE_STATUS_TRUNCATED_FINAL') {
      throw new TruncatedError('Yandex: translation was truncated; increase maxTokens or split input.');
    }

    return {
      text: extractBetweenMarkers(content, this.name),
      usage: data.result?.usage ?? null,
    };
  }
}

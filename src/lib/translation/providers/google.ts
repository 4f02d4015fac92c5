import { z } from 'zod';
import { ResponseMalformedError, TruncatedError, VendorApiError } from '../../errors.js';
import type { DriverOptions, DriverRequest, DriverResponse, ModelConfig } from '../types.js';
import { configHeaders, decodeJsonObject, extractBetweenMarkers, MarkerDriver, wrapInMarkers } from './base.js';

interface GeminiGenerationConfig {
  temperature: number;
  candidateCount: number;
  maxOutputTokens?: number;
  thinkingConfig?: {
    thinkingBudget?: number;
    includeThoughts?: boolean;
  };
}

const geminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        finishReason: z.string().optional(),
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() }).passthrough()).optional(),
          })
          .optional(),
      }),
    )
    .optional(),
  usageMetadata: z.record(z.unknown()).nullish(),
  error: z
    .object({
      code: z.number().optional(),
      message: z.string().optional(),
      status: z.string().optional(),
    })
    .nullish(),
});

/** Driver for Gemini's `generateContent` endpoint. */
export class GoogleDriver extends MarkerDriver {
  readonly name = 'Gemini';
  readonly vendor = 'google';

  buildRequest(config: ModelConfig, text: string, options: DriverOptions): DriverRequest {
    const defaults = config.defaults ?? {};
    const { systemPrompt, temperature } = this.chatSettings(config, options);

    const generationConfig: GeminiGenerationConfig = {
      temperature,
      candidateCount: defaults.candidateCount ?? 1,
    };
    const maxOutputTokens = options.maxTokens ?? defaults.maxOutputTokens;
    if (maxOutputTokens !== undefined && maxOutputTokens !== null) {
      generationConfig.maxOutputTokens = maxOutputTokens;
    }
    if (typeof defaults.thinkingBudget === 'number' || typeof defaults.includeThoughts === 'boolean') {
      generationConfig.thinkingConfig = {
        ...(typeof defaults.thinkingBudget === 'number' ? { thinkingBudget: defaults.thinkingBudget } : {}),
        ...(typeof defaults.includeThoughts === 'boolean' ? { includeThoughts: defaults.includeThoughts } : {}),
      };
    }

    return {
      url: config.endpoint ?? '',
      headers: configHeaders(config),
      body: JSON.stringify({
        system_instruction: { parts: [{ text: systemPrompt }] },
        contents: [{ parts: [{ text: wrapInMarkers(text) }] }],
        generationConfig,
      }),
    };
  }

  parseResponse(_config: ModelConfig, responseBody: string): DriverResponse {
    const parsed = geminiResponseSchema.safeParse(decodeJsonObject(responseBody));
    if (!parsed.success) {
      throw new ResponseMalformedError(`Gemini translation failed: ${responseBody}`);
    }
    const data = parsed.data;

    if (data.error) {
      const code = data.error.code !== undefined ? ` (HTTP ${data.error.code})` : '';
      const message = data.error.message ?? data.error.status ?? 'Unknown error';
      throw new VendorApiError('google', `Gemini API error${code}: ${message}`);
    }

    const candidate = data.candidates?.[0];
    if (!candidate) {
      throw new ResponseMalformedError(`Gemini response has no candidates: ${responseBody}`);
    }

    const finishReason = candidate.finishReason ?? '';
    if (finishReason === 'MAX_TOKENS') {
      throw new TruncatedError(
        "Gemini: translation was truncated, reached model's max output tokens.\n" +
          'Try increasing maxOutputTokens or splitting input into smaller chunks.',
      );
    }
    if (finishReason !== 'STOP') {
      throw new ResponseMalformedError(
        `Gemini: unexpected finishReason '${finishReason}', check the response output:\n${responseBody}`,
      );
    }

    const parts = candidate.content?.parts;
    if (!parts) {
      throw new ResponseMalformedError('Gemini translation failed: no text parts in response.');
    }
    const content = parts.map((part) => part.text ?? '').join('');

    return {
      text: extractBetweenMarkers(content, this.name),
      usage: data.usageMetadata ?? null,
    };
  }
}

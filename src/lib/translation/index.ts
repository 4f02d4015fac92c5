export { AnthropicDriver } from './providers/anthropic.js';
export { END_MARKER, extractBetweenMarkers, START_MARKER, wrapInMarkers } from './providers/base.js';
export { DeepLDriver, protectJson, restoreJson } from './providers/deepl.js';
export { GoogleDriver } from './providers/google.js';
export { OpenAIDriver } from './providers/openai.js';
export { XaiDriver } from './providers/xai.js';
export { YandexDriver } from './providers/yandex.js';
export { DOCUMENT_FORMATS, isDocumentFormat, modelConfigSchema } from './types.js';
export type {
  AuthRequirement,
  DocumentFormat,
  DriverOptions,
  DriverRequest,
  DriverResponse,
  ModelConfig,
  ModelDriver,
  UsageSpec,
  Vendor,
} from './types.js';

import { ConfigurationError } from '../errors.js';
import type { PromptCatalog } from '../prompts/prompt-catalog.js';
import { AnthropicDriver } from './providers/anthropic.js';
import { DeepLDriver } from './providers/deepl.js';
import { GoogleDriver } from './providers/google.js';
import { OpenAIDriver } from './providers/openai.js';
import { XaiDriver } from './providers/xai.js';
import { YandexDriver } from './providers/yandex.js';
import type { ModelDriver, Vendor } from './types.js';

/**
 * List of vendors a registry entry may name.
 */
export const SUPPORTED_VENDORS = [
  'openai',
  'anthropic',
  'google',
  'xai',
  'yandex',
  'deepl',
] as const satisfies readonly Vendor[];

export function isSupportedVendor(value: string): value is Vendor {
  return SUPPORTED_VENDORS.some((vendor) => vendor === value);
}

/**
 * Creates the driver for a registry entry's vendor tag.
 *
 * @throws ConfigurationError if the vendor is not supported
 *
 * @example
 * ```ts
 * const driver = createDriver('openai', PromptCatalog.loadDefault());
 * const request = driver.buildRequest(registry.get('openai:gpt-4o'), 'Bonjour', { format: 'text' });
 * ```
 */
export function createDriver(vendor: string, prompts: PromptCatalog): ModelDriver {
  if (!isSupportedVendor(vendor)) {
    throw new ConfigurationError(
      `Unsupported vendor "${vendor}". Available vendors: ${SUPPORTED_VENDORS.join(', ')}`,
    );
  }

  switch (vendor) {
    case 'openai':
      return new OpenAIDriver(prompts);

    case 'anthropic':
      return new AnthropicDriver(prompts);

    case 'google':
      return new GoogleDriver(prompts);

    case 'xai':
      return new XaiDriver(prompts);

    case 'yandex':
      return new YandexDriver(prompts);

    case 'deepl':
      return new DeepLDriver();
  }
}

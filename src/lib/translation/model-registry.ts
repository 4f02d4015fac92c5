import { readFileSync } from 'node:fs';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../errors.js';
import type { PromptCatalog } from '../prompts/prompt-catalog.js';
import { resolveResource } from '../resources.js';
import { createDriver } from './index.js';
import { type ModelConfig, type ModelDriver, modelConfigSchema } from './types.js';

type RawEntry = Record<string, unknown>;

const documentSchema = z
  .record(z.record(z.unknown()))
  .refine((entries) => Object.keys(entries).length > 0, 'no models defined');

export interface ModelListing {
  key: string;
  vendor: string;
  name: string | null;
  format: string | null;
  notes: string | null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Recursive merge; `override` wins, arrays and scalars are replaced wholesale. */
function deepMerge(base: RawEntry, override: RawEntry): RawEntry {
  const merged: RawEntry = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

/**
 * Expand vendor groups (`openai: { endpoint, models: { gpt-4o: {...} } }`)
 * into `openai:gpt-4o` entries. Entries without `models` are kept as-is.
 */
function flatten(document: Record<string, RawEntry>): Record<string, RawEntry> {
  const flat: Record<string, RawEntry> = {};

  for (const [key, entry] of Object.entries(document)) {
    const { models, ...shared } = entry;
    if (!isPlainObject(models)) {
      flat[key] = { vendor: key, ...entry };
      continue;
    }

    for (const [modelName, modelEntry] of Object.entries(models)) {
      const own = isPlainObject(modelEntry) ? modelEntry : {};
      flat[`${key}:${modelName}`] = deepMerge({ vendor: key, ...shared }, own);
    }
  }

  return flat;
}

/**
 * Declarative catalog of translation models, loaded from `models.yaml`.
 *
 * @example
 * ```ts
 * const registry = ModelRegistry.loadDefault();
 * registry.getEndpoint('deepl:free'); // 'https://api-free.deepl.com/v2/translate'
 * ```
 */
export class ModelRegistry {
  private readonly models: Map<string, ModelConfig>;

  constructor(document: Record<string, RawEntry>) {
    this.models = new Map();
    for (const [key, entry] of Object.entries(flatten(document))) {
      const parsed = modelConfigSchema.safeParse(entry);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new ConfigurationError(`Invalid model definition '${key}': ${issues}`);
      }
      this.models.set(key, parsed.data);
    }
  }

  static fromFile(path: string): ModelRegistry {
    let source: string;
    try {
      source = readFileSync(path, 'utf8');
    } catch (error) {
      throw new ConfigurationError(`Models file not found or not readable: ${path} (${errorMessage(error)})`);
    }

    let data: unknown;
    try {
      data = parse(source);
    } catch (error) {
      throw new ConfigurationError(`Models YAML is invalid at ${path}: ${errorMessage(error)}`);
    }

    const parsed = documentSchema.safeParse(data);
    if (!parsed.success) {
      throw new ConfigurationError(`Models YAML is empty or invalid at ${path}: ${parsed.error.message}`);
    }
    return new ModelRegistry(parsed.data);
  }

  static loadDefault(): ModelRegistry {
    return ModelRegistry.fromFile(resolveResource('models.yaml'));
  }

  has(key: string): boolean {
    return this.models.has(key);
  }

  /** @throws ConfigurationError for unknown keys */
  get(key: string): ModelConfig {
    const model = this.models.get(key);
    if (!model) {
      throw new ConfigurationError(`Unknown model key: ${key}`);
    }
    return model;
  }

  list(): string[] {
    return [...this.models.keys()];
  }

  getAll(): Record<string, ModelConfig> {
    return Object.fromEntries(this.models);
  }

  /** Listing grouped the way the CLI prints it. */
  describe(): ModelListing[] {
    return [...this.models.entries()].map(([key, model]) => ({
      key,
      vendor: model.vendor,
      name: model.name ?? null,
      format: model.format ?? null,
      notes: model.notes ?? null,
    }));
  }

  getEndpoint(key: string): string | null {
    return this.models.get(key)?.endpoint ?? null;
  }

  getFormat(key: string): string | null {
    return this.models.get(key)?.format ?? null;
  }

  getCharLimit(key: string): number | null {
    return this.models.get(key)?.limits?.estimated_max_chars ?? null;
  }

  getAuthEnv(key: string): string | null {
    return this.models.get(key)?.requirements?.auth?.env ?? null;
  }

  getHelpUrl(key: string): string | null {
    return this.models.get(key)?.requirements?.auth?.help_url ?? null;
  }

  getNotes(key: string): string | null {
    return this.models.get(key)?.notes ?? null;
  }

  /** Per-call variables the model needs, as `name => env var`. */
  getVariables(key: string): Record<string, string> {
    return { ...(this.models.get(key)?.requirements?.variables ?? {}) };
  }

  getDriver(key: string, prompts: PromptCatalog): ModelDriver {
    return createDriver(this.get(key).vendor, prompts);
  }
}

import { ConfigurationError } from '../lib/errors.js';
import { env, readEnv } from '../lib/env.js';
import { PromptCatalog } from '../lib/prompts/prompt-catalog.js';
import { ModelRegistry } from '../lib/translation/model-registry.js';

export type MessageKind = 'info' | 'warn' | 'err' | 'ok';

const EMOJI: Record<MessageKind, string> = {
  info: 'ℹ️  ',
  warn: '⚠️  ',
  err: '❌ ',
  ok: '✅ ',
};

const PLAIN: Record<MessageKind, string> = {
  info: '[info] ',
  warn: '[warn] ',
  err: '[err] ',
  ok: '[ok] ',
};

export interface GlobalOptions {
  plain?: boolean;
}

export interface CliContext {
  /** Message prefix for stderr output */
  p(kind: MessageKind): string;
  loadRegistry(): ModelRegistry;
  loadPrompts(): PromptCatalog;
  /** Credential from the model's `requirements.auth.env` variable */
  resolveApiKey(registry: ModelRegistry, modelKey: string): { apiKey?: string; envVar: string | null };
  /** Model variables from their env vars, overridden by explicit values */
  resolveVariables(
    registry: ModelRegistry,
    modelKey: string,
    overrides: Record<string, string>,
  ): { variables: Record<string, string>; missing: Array<{ name: string; envVar: string }> };
}

/** Split `a,b , c` into trimmed, non-empty items. */
export function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

/**
 * Parse `k=v,k2=v2`. Values may contain `=`; entries without one are rejected.
 */
export function parseVariables(value: string | undefined): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const entry of parseList(value)) {
    const separator = entry.indexOf('=');
    if (separator <= 0) {
      throw new ConfigurationError(`Invalid variable '${entry}'. Expected key=value.`);
    }
    variables[entry.slice(0, separator).trim()] = entry.slice(separator + 1).trim();
  }
  return variables;
}

export function createCliContext(options: GlobalOptions = {}, source: NodeJS.ProcessEnv = process.env): CliContext {
  const plain = options.plain || readEnv('NO_COLOR', source) !== undefined;

  return {
    p: (kind) => (plain ? PLAIN[kind] : EMOJI[kind]),

    loadRegistry: () => {
      const path = env.modelsPath;
      return path ? ModelRegistry.fromFile(path) : ModelRegistry.loadDefault();
    },

    loadPrompts: () => {
      const path = env.promptsPath;
      return path ? PromptCatalog.fromFile(path) : PromptCatalog.loadDefault();
    },

    resolveApiKey: (registry, modelKey) => {
      const envVar = registry.getAuthEnv(modelKey);
      return { apiKey: envVar ? readEnv(envVar, source) : undefined, envVar };
    },

    resolveVariables: (registry, modelKey, overrides) => {
      const variables: Record<string, string> = {};
      const missing: Array<{ name: string; envVar: string }> = [];
      for (const [name, envVar] of Object.entries(registry.getVariables(modelKey))) {
        const value = overrides[name] ?? readEnv(envVar, source);
        if (value === undefined) {
          missing.push({ name, envVar });
        } else {
          variables[name] = value;
        }
      }
      return { variables: { ...overrides, ...variables }, missing };
    },
  };
}

import { readFileSync } from 'node:fs';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage, FormatNotFoundError, TemplateNotFoundError } from '../errors.js';
import { resolveResource } from '../resources.js';

const NOTES_KEY = 'notes';

const templatesSchema = z
  .record(z.record(z.string()))
  .refine((groups) => Object.keys(groups).length > 0, 'no template groups defined');

/** kind => { format => template, notes? } */
export type PromptTemplates = Record<string, Record<string, string>>;

export type PromptVariables = Record<string, string | number | boolean>;

export interface PromptListing {
  formats: string[];
  notes: string | null;
}

/**
 * System prompt templates keyed by kind (e.g. `translator`) and document format.
 *
 * Rendering is plain `{name}` substitution, done in one pass so substituted
 * values are never scanned again.
 */
export class PromptCatalog {
  private readonly templates: PromptTemplates;

  constructor(templates: PromptTemplates) {
    this.templates = templates;
  }

  static fromFile(path: string): PromptCatalog {
    let source: string;
    try {
      source = readFileSync(path, 'utf8');
    } catch (error) {
      throw new ConfigurationError(`Prompts file not found or not readable: ${path} (${errorMessage(error)})`);
    }

    let data: unknown;
    try {
      data = parse(source);
    } catch (error) {
      throw new ConfigurationError(`Prompts YAML is invalid at ${path}: ${errorMessage(error)}`);
    }

    const parsed = templatesSchema.safeParse(data);
    if (!parsed.success) {
      throw new ConfigurationError(`Prompts YAML is empty or invalid at ${path}: ${parsed.error.message}`);
    }
    return new PromptCatalog(parsed.data);
  }

  static loadDefault(): PromptCatalog {
    return PromptCatalog.fromFile(resolveResource('prompts.yaml'));
  }

  render(kind: string, format: string, vars: PromptVariables): string {
    const group = this.templates[kind];
    if (!group) {
      throw new TemplateNotFoundError(kind);
    }
    const template = format === NOTES_KEY ? undefined : group[format];
    if (template === undefined) {
      throw new FormatNotFoundError(kind, format);
    }

    return template.replace(/\{([A-Za-z0-9_]+)\}/g, (placeholder, name: string) =>
      Object.hasOwn(vars, name) ? String(vars[name]) : placeholder,
    );
  }

  has(kind: string, format?: string): boolean {
    const group = this.templates[kind];
    if (!group) {
      return false;
    }
    return format === undefined || (format !== NOTES_KEY && group[format] !== undefined);
  }

  list(): Record<string, PromptListing> {
    const out: Record<string, PromptListing> = {};
    for (const [kind, group] of Object.entries(this.templates)) {
      out[kind] = {
        formats: Object.keys(group).filter((key) => key !== NOTES_KEY),
        notes: group[NOTES_KEY] ?? null,
      };
    }
    return out;
  }
}

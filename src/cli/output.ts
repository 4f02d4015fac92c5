import type { LingopipeError } from '../lib/errors.js';
import type { PromptListing } from '../lib/prompts/prompt-catalog.js';
import type { TranslateResult } from '../lib/translate.js';
import type { ModelListing } from '../lib/translation/model-registry.js';

/** Stats block printed to stderr after a translation. */
export function formatSummary(result: Pick<TranslateResult, 'lengths' | 'filterStats' | 'consumed'>): string {
  const lines = [
    'Characters processed:',
    `\tOriginal:    ${result.lengths.original}`,
    `\tPrepared:    ${result.lengths.prepared}`,
    `\tTranslated:  ${result.lengths.translated}`,
    '',
    'Filter statistics:',
  ];

  if (result.filterStats.length === 0) {
    lines.push('\t(no filters applied)');
  } else {
    for (const stat of result.filterStats) {
      lines.push(`\t${stat.filter}:\t${stat.count} placeholder(s)`);
    }
  }

  const categories = Object.entries(result.consumed);
  if (categories.length > 0) {
    lines.push('', 'Usage metrics:');
    for (const [category, usage] of categories) {
      const parts: string[] = [];
      if (usage.total !== undefined) {
        parts.push(`total ${usage.total}`);
      }
      const breakdown = Object.entries(usage.breakdown ?? {}).map(([label, value]) => `${label}: ${value}`);
      if (breakdown.length > 0) {
        parts.push(`(${breakdown.join(', ')})`);
      }
      lines.push(`\t${category}:\t${parts.join(' ')}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

/** Request/response previews gathered before a failure. */
export function formatDiagnostics(error: LingopipeError): string {
  const { stage, httpStatus, debugRequest, debugResponse } = error.diagnostics;
  const parts: string[] = [];
  if (stage) {
    parts.push(`Failed at stage: ${stage}`);
  }
  if (httpStatus !== undefined && httpStatus > 0) {
    parts.push(`HTTP status: ${httpStatus}`);
  }
  if (debugRequest) {
    parts.push(debugRequest.trimEnd());
  }
  if (debugResponse) {
    parts.push(debugResponse.trimEnd());
  }
  return parts.join('\n');
}

export function formatModelList(models: ModelListing[]): string {
  const byVendor = new Map<string, ModelListing[]>();
  for (const model of models) {
    const group = byVendor.get(model.vendor) ?? [];
    group.push(model);
    byVendor.set(model.vendor, group);
  }

  const lines: string[] = ['Available models:'];
  for (const [vendor, group] of byVendor) {
    lines.push('', `${vendor}:`);
    for (const model of group) {
      const format = model.format ? ` [${model.format}]` : '';
      lines.push(`  ${model.key}${format}`);
      if (model.notes) {
        lines.push(`      ${model.notes}`);
      }
    }
  }
  return `${lines.join('\n')}\n`;
}

export function formatPromptList(prompts: Record<string, PromptListing>): string {
  const lines: string[] = ['Available prompts:'];
  for (const [kind, listing] of Object.entries(prompts)) {
    lines.push('', `${kind} (${listing.formats.join(', ')})`);
    if (listing.notes) {
      lines.push(`  ${listing.notes.trim()}`);
    }
  }
  return `${lines.join('\n')}\n`;
}

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError, FormatNotFoundError, TemplateNotFoundError } from '../src/lib/errors.js';
import { PromptCatalog } from '../src/lib/prompts/index.js';

describe('PromptCatalog', () => {
  const catalog = new PromptCatalog({
    translator: {
      notes: 'default',
      text: 'From {source} to {target} {start}/{end} {context}',
    },
  });

  it('substitutes variables', () => {
    expect(
      catalog.render('translator', 'text', { source: 'auto', target: 'DE', start: '<<', end: '>>', context: '' }),
    ).toBe('From auto to DE <</>> ');
  });

  it('does not re-scan substituted values', () => {
    expect(
      catalog.render('translator', 'text', {
        source: '{target}',
        target: 'FR',
        start: 'S',
        end: 'E',
        context: 'Context: {source}',
      }),
    ).toBe('From {target} to FR S/E Context: {source}');
  });

  it('leaves unknown placeholders in place', () => {
    expect(catalog.render('translator', 'text', { source: 'EN' })).toBe('From EN to {target} {start}/{end} {context}');
  });

  it('raises TemplateNotFoundError for a missing kind', () => {
    expect(() => catalog.render('poet', 'text', {})).toThrow(TemplateNotFoundError);
    expect(() => catalog.render('poet', 'text', {})).toThrow("Prompt group 'poet' not found");
  });

  it('raises FormatNotFoundError for a missing format, including notes', () => {
    expect(() => catalog.render('translator', 'json', {})).toThrow(FormatNotFoundError);
    expect(() => catalog.render('translator', 'notes', {})).toThrow("Prompt 'translator.notes' not found");
  });

  it('lists formats without notes', () => {
    expect(catalog.list()).toEqual({ translator: { formats: ['text'], notes: 'default' } });
    expect(catalog.has('translator')).toBe(true);
    expect(catalog.has('translator', 'text')).toBe(true);
    expect(catalog.has('translator', 'notes')).toBe(false);
    expect(catalog.has('other')).toBe(false);
  });

  it('ships a default catalog covering every format', () => {
    const defaults = PromptCatalog.loadDefault();
    const translator = defaults.list().translator;
    expect(translator?.formats).toEqual(['text', 'html', 'json']);

    for (const format of ['text', 'html', 'json']) {
      const rendered = defaults.render('translator', format, {
        source: 'auto',
        target: 'EN',
        start: 'START',
        end: 'END',
        context: 'Context: test',
      });
      expect(rendered).toContain('from auto to EN');
      expect(rendered).toContain('START');
      expect(rendered).toContain('Context: test');
      expect(rendered).not.toMatch(/\{(source|target|start|end|context)\}/);
    }
  });

  describe('fromFile', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'lingopipe-prompts-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('loads YAML templates', () => {
      const path = join(dir, 'prompts.yaml');
      writeFileSync(path, 'short:\n  text: "Say {target}"\n');
      expect(PromptCatalog.fromFile(path).render('short', 'text', { target: 'hi' })).toBe('Say hi');
    });

    it('rejects missing and empty files', () => {
      expect(() => PromptCatalog.fromFile(join(dir, 'missing.yaml'))).toThrow(ConfigurationError);

      const empty = join(dir, 'empty.yaml');
      writeFileSync(empty, '');
      expect(() => PromptCatalog.fromFile(empty)).toThrow(ConfigurationError);
    });
  });
});

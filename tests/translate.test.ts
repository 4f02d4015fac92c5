import { describe, expect, it, vi } from 'vitest';
import {
  AuthError,
  ConfigurationError,
  isLingopipeError,
  type LingopipeError,
  TransportError,
  ValidationError,
  VendorApiError,
} from '../src/lib/errors.js';
import type { HttpClient, HttpRequest, HttpResponse } from '../src/lib/http-client.js';
import { createLogger } from '../src/lib/logger.js';
import { PromptCatalog } from '../src/lib/prompts/index.js';
import { applyAuth, type TranslateRequest, translate } from '../src/lib/translate.js';
import { END_MARKER, type ModelConfig, START_MARKER } from '../src/lib/translation/index.js';
import { ModelRegistry } from '../src/lib/translation/model-registry.js';

const registry = new ModelRegistry({
  openai: {
    endpoint: 'https://api.openai.test/v1/chat/completions',
    requirements: {
      auth: { type: 'header', prefix: 'Bearer' },
      headers: ['Content-Type: application/json'],
    },
    usage: {
      tokens: { total: 'total_tokens', breakdown: { prompt: 'prompt_tokens', completion: 'completion_tokens' } },
    },
    http_error_handling: true,
    models: {
      'gpt-test': { defaults: { model: 'gpt-test' } },
    },
  },
  deepl: {
    endpoint: 'https://api-free.deepl.test/v2/translate',
    requirements: {
      auth: { type: 'form', key_name: 'auth_key' },
      headers: ['Content-Type: application/x-www-form-urlencoded'],
      body_type: 'form',
    },
    models: {
      free: { defaults: { target_lang: 'EN' } },
      tiny: { limits: { estimated_max_chars: 2010 } },
    },
  },
  broken: { vendor: 'openai', defaults: { model: 'gpt-test' } },
});

const prompts = new PromptCatalog({
  translator: {
    text: 'Translate from {source} to {target}. {start}{end} {context}',
    html: 'Translate HTML to {target}.',
    json: 'Translate JSON values to {target}.',
  },
});

const logger = createLogger('silent');

class FakeHttpClient implements HttpClient {
  readonly requests: HttpRequest[] = [];

  constructor(private readonly reply: Partial<HttpResponse>) {}

  async request(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    return { status: 200, headers: {}, body: '', debugRequest: '', debugResponse: '', ...this.reply };
  }
}

function openAIReply(content: string, usage: Record<string, number> = {}): string {
  return JSON.stringify({
    choices: [{ message: { content: `${START_MARKER}\n${content}\n${END_MARKER}` }, finish_reason: 'stop' }],
    usage,
  });
}

function request(overrides: Partial<TranslateRequest> = {}): TranslateRequest {
  return { text: 'Hello', modelKey: 'openai:gpt-test', format: 'text', apiKey: 'test-secret', ...overrides };
}

async function failure(run: Promise<unknown>): Promise<LingopipeError> {
  try {
    await run;
  } catch (error) {
    if (isLingopipeError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error('expected translate to fail');
}

describe('translate', () => {
  describe('dry run', () => {
    const text = 'Read <a href="https://example.com/page?id=1">link</a> or https://another.tld';

    it('masks, skips the HTTP call and restores the original text', async () => {
      const result = await translate(
        request({ text, modelKey: 'deepl:free', filters: ['url', 'html_a'], dryRun: true }),
        { registry, prompts, logger },
      );

      expect(result.original).toBe(text);
      expect(result.prepared).toBe('Read @@2@@ or @@1@@');
      expect(result.result).toBe(text);
      expect(result.httpStatus).toBe(0);
      expect(result.rawResponseBody).toBe('[dry-run]');
      expect(result.consumed).toEqual({});
      expect(result.filterStats).toEqual([
        { filter: 'url', count: 2 },
        { filter: 'html_a', count: 1 },
      ]);
      expect(result.lengths).toEqual({ original: text.length, prepared: 19, translated: text.length });
    });

    it('prints a redacted request preview', async () => {
      const result = await translate(request({ text: 'Hallo', modelKey: 'deepl:free', dryRun: true }), {
        registry,
        prompts,
        logger,
      });

      expect(result.debugRequest).toBe(
        '\nDry-run: request (not sent)\nPOST https://api-free.deepl.test/v2/translate\n\nHeaders:\n' +
          '  Content-Type: application/x-www-form-urlencoded\n\n' +
          'Body:\ntext=Hallo&target_lang=EN&formality=prefer_more&auth_key=***\n\n',
      );
    });

    it('passes placeholder-like text through when no filter is active', async () => {
      const result = await translate(request({ text: 'Keep @@0@@', modelKey: 'deepl:free', dryRun: true }), {
        registry,
        prompts,
        logger,
      });
      expect(result.result).toBe('Keep @@0@@');
    });
  });

  describe('request path', () => {
    it('authenticates, sends and normalizes usage', async () => {
      const http = new FakeHttpClient({
        body: openAIReply('Hallo', { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 }),
      });

      const result = await translate(request({ targetLang: 'DE' }), { registry, prompts, logger, httpClient: http });

      expect(result.result).toBe('Hallo');
      expect(result.httpStatus).toBe(200);
      expect(result.consumed).toEqual({ tokens: { total: 15, breakdown: { prompt: 10, completion: 5 } } });

      expect(http.requests).toHaveLength(1);
      const [sent] = http.requests;
      expect(sent?.method).toBe('POST');
      expect(sent?.url).toBe('https://api.openai.test/v1/chat/completions');
      expect(sent?.headers).toEqual(['Content-Type: application/json', 'Authorization: Bearer test-secret']);
      expect(sent?.maskPatterns).toEqual(['test-secret']);
      expect(sent?.dryRun).toBe(false);
    });

    it('reports progress through onFeedback', async () => {
      const onFeedback = vi.fn();
      await translate(request({ onFeedback }), {
        registry,
        prompts,
        logger,
        httpClient: new FakeHttpClient({ body: openAIReply('Hallo') }),
      });

      expect(onFeedback).toHaveBeenCalledWith('Prepared 5 chars with 0 placeholder(s)', 'info');
      expect(onFeedback).toHaveBeenCalledWith('Sending request to OpenAI', 'info');
    });

    it('restores placeholders in the translated text', async () => {
      const http = new FakeHttpClient({ body: openAIReply('Siehe @@0@@ jetzt') });

      const result = await translate(request({ text: 'See https://a.test now', filters: ['url'] }), {
        registry,
        prompts,
        logger,
        httpClient: http,
      });

      expect(result.prepared).toBe('See @@0@@ now');
      expect(result.result).toBe('Siehe https://a.test jetzt');
    });

    it('wraps network failures', async () => {
      const http: HttpClient = { request: vi.fn().mockRejectedValue(new Error('socket hang up')) };

      const error = await failure(translate(request(), { registry, prompts, logger, httpClient: http }));

      expect(error).toBeInstanceOf(TransportError);
      expect(error.message).toBe('Network error: socket hang up');
      expect(error.diagnostics.stage).toBe('transmit');
    });
  });

  describe('HTTP errors', () => {
    it('lets the driver classify the body when http_error_handling is on', async () => {
      const http = new FakeHttpClient({
        status: 401,
        body: JSON.stringify({ error: { message: 'Incorrect API key provided' } }),
      });

      const error = await failure(translate(request(), { registry, prompts, logger, httpClient: http }));

      expect(error).toBeInstanceOf(VendorApiError);
      expect(error.message).toBe('OpenAI error: Incorrect API key provided');
      expect(error.diagnostics.httpStatus).toBe(401);
      expect(error.diagnostics.stage).toBe('parse-response');
    });

    it('raises a transport error otherwise', async () => {
      const http = new FakeHttpClient({ status: 456, body: 'Quota exceeded' });

      const error = await failure(
        translate(request({ modelKey: 'deepl:free' }), { registry, prompts, logger, httpClient: http }),
      );

      expect(error).toBeInstanceOf(TransportError);
      expect(error.message).toBe('HTTP 456 from deepl:free: Quota exceeded');
      expect(error.diagnostics).toMatchObject({
        stage: 'transmit',
        httpStatus: 456,
        rawResponseBody: 'Quota exceeded',
      });
    });

    it('redacts the API key from HTTP error messages', async () => {
      const http = new FakeHttpClient({ status: 403, body: 'Key test-secret is not allowed' });

      const error = await failure(
        translate(request({ modelKey: 'deepl:free' }), { registry, prompts, logger, httpClient: http }),
      );

      expect(error.message).toBe('HTTP 403 from deepl:free: Key *** is not allowed');
      expect(error.diagnostics.rawResponseBody).toBe('Key *** is not allowed');
    });
  });

  describe('HTML documents', () => {
    it('translates well-formed markup', async () => {
      const http = new FakeHttpClient({ body: openAIReply('<p>Hallo</p>') });

      const result = await translate(request({ text: '<p>Hello</p>', format: 'html' }), {
        registry,
        prompts,
        logger,
        httpClient: http,
      });

      expect(result.result).toBe('<p>Hallo</p>');
    });

    it('rejects malformed markup before sending anything', async () => {
      const http = new FakeHttpClient({});

      const error = await failure(
        translate(request({ text: '<div><span></div>', format: 'html' }), {
          registry,
          prompts,
          logger,
          httpClient: http,
        }),
      );

      expect(error).toBeInstanceOf(ValidationError);
      expect(error.message.startsWith('HTML validation failed before translation')).toBe(true);
      expect(error.diagnostics.stage).toBe('pre-validate');
      expect(http.requests).toHaveLength(0);
    });

    it('rejects markup the backend broke', async () => {
      const http = new FakeHttpClient({ body: openAIReply('<p>Hallo</b>') });

      const error = await failure(
        translate(request({ text: '<p>Hello</p>', format: 'html' }), { registry, prompts, logger, httpClient: http }),
      );

      expect(error).toBeInstanceOf(ValidationError);
      expect(error.message.startsWith('HTML validation failed after translation')).toBe(true);
      expect(error.diagnostics.stage).toBe('post-validate');
      expect(http.requests).toHaveLength(1);
    });
  });

  describe('JSON documents', () => {
    const source = '{"title":"Hello","count":2,"note":null}';

    it('marks schema capture and validation in verbose output', async () => {
      const http = new FakeHttpClient({
        body: openAIReply('{"title":"Hallo","count":2,"note":null}'),
        debugRequest: 'REQ\n',
        debugResponse: 'RES\n',
      });

      const result = await translate(request({ text: source, format: 'json', verbose: true }), {
        registry,
        prompts,
        logger,
        httpClient: http,
      });

      expect(result.result).toBe('{"title":"Hallo","count":2,"note":null}');
      expect(result.debugRequest).toBe('REQ\n[JSON schema captured]\n');
      expect(result.debugResponse).toBe('RES\n[JSON schema validated]\n');
    });

    it('adds no markers without verbose', async () => {
      const http = new FakeHttpClient({ body: openAIReply(source) });

      const result = await translate(request({ text: source, format: 'json' }), {
        registry,
        prompts,
        logger,
        httpClient: http,
      });

      expect(result.debugRequest).toBe('');
      expect(result.debugResponse).toBe('');
    });

    it('repairs dropped nulls when asked', async () => {
      const onFeedback = vi.fn();
      const http = new FakeHttpClient({ body: openAIReply('{"title":"Hallo","count":2}'), debugResponse: 'RES\n' });

      const result = await translate(
        request({ text: source, format: 'json', verbose: true, repairs: ['missing_nulls'], onFeedback }),
        { registry, prompts, logger, httpClient: http },
      );

      expect(JSON.parse(result.result)).toEqual({ title: 'Hallo', count: 2, note: null });
      expect(result.debugResponse).toBe('RES\n[JSON schema repaired]\n[JSON schema validated]\n');
      expect(onFeedback).toHaveBeenCalledWith('Restored missing null values in translated JSON', 'warning');
    });

    it('rejects a changed structure', async () => {
      const http = new FakeHttpClient({ body: openAIReply('{"title":"Hallo","count":2}') });

      const error = await failure(
        translate(request({ text: source, format: 'json' }), { registry, prompts, logger, httpClient: http }),
      );

      expect(error).toBeInstanceOf(ValidationError);
      expect(error.message).toBe('JSON schema mismatch after translation:\n- Structure mismatch after translation');
      expect(error.diagnostics.stage).toBe('post-validate');
    });

    it('rejects invalid JSON before sending anything', async () => {
      const http = new FakeHttpClient({});

      const error = await failure(
        translate(request({ text: '{"title":', format: 'json' }), { registry, prompts, logger, httpClient: http }),
      );

      expect(error).toBeInstanceOf(ValidationError);
      expect(error.message.startsWith('JSON validation failed before translation')).toBe(true);
      expect(error.diagnostics.stage).toBe('pre-validate');
      expect(http.requests).toHaveLength(0);
    });

    it('skips checks when validation is off', async () => {
      const http = new FakeHttpClient({ body: openAIReply('not json') });

      const result = await translate(request({ text: '{"title":', format: 'json', validate: false }), {
        registry,
        prompts,
        logger,
        httpClient: http,
      });

      expect(result.result).toBe('not json');
    });
  });

  describe('input checks', () => {
    it('refuses to mask text that already contains placeholders', async () => {
      const http = new FakeHttpClient({});

      const error = await failure(
        translate(request({ text: 'Keep @@0@@ https://x.test', filters: ['url'] }), {
          registry,
          prompts,
          logger,
          httpClient: http,
        }),
      );

      expect(error).toBeInstanceOf(ValidationError);
      expect(error.message.startsWith('Input cannot be masked safely')).toBe(true);
      expect(error.diagnostics.stage).toBe('mask');
      expect(http.requests).toHaveLength(0);
    });

    it('refuses masks that would fuse with neighbouring characters', async () => {
      const http = new FakeHttpClient({});

      const error = await failure(
        translate(request({ text: '@@0<a>x</a>', filters: ['html_a'] }), {
          registry,
          prompts,
          logger,
          httpClient: http,
        }),
      );

      expect(error).toBeInstanceOf(ValidationError);
      expect(error.message.startsWith('Input cannot be masked safely')).toBe(true);
      expect(error.diagnostics.stage).toBe('mask');
      expect(http.requests).toHaveLength(0);
    });

    it('enforces the model length limit on the prepared text', async () => {
      const error = await failure(
        translate(request({ text: 'Hello world!', modelKey: 'deepl:tiny' }), { registry, prompts, logger }),
      );

      expect(error).toBeInstanceOf(ValidationError);
      expect(error.message).toBe(
        'Prepared text exceeds model limits:\n- Prepared text length 12 exceeds limit 10 by 2 chars ' +
          '(includes 2000 overhead). Split input or reduce max output tokens.',
      );
      expect(error.diagnostics.preparedLength).toBe(12);
    });

    it.each([
      [{ modelKey: 'nope:model' }, ConfigurationError, 'Unknown model key: nope:model'],
      [{ modelKey: 'broken' }, ConfigurationError, 'Model broken missing required configuration.'],
      [{ format: 'xml' }, ConfigurationError, "Invalid format: 'xml'. Allowed: text, html, json."],
      [{ apiKey: '  ' }, AuthError, 'API key is required for openai:gpt-test'],
    ])('rejects %o', async (overrides, type, message) => {
      const error = await failure(translate(request(overrides), { registry, prompts, logger }));

      expect(error).toBeInstanceOf(type);
      expect(error.message).toBe(message);
      expect(error.diagnostics.stage).toBe('start');
    });

    it('reports failures through onFeedback', async () => {
      const onFeedback = vi.fn();

      await failure(translate(request({ modelKey: 'nope:model', onFeedback }), { registry, prompts, logger }));

      expect(onFeedback).toHaveBeenCalledWith('Unknown model key: nope:model', 'error');
    });
  });
});

describe('applyAuth', () => {
  const base = { url: 'https://api.test/v1', headers: [], body: '{"text":"hi"}' };

  it('adds a prefixed Authorization header', () => {
    const model: ModelConfig = { vendor: 'openai', requirements: { auth: { type: 'header', prefix: 'Bearer' } } };
    expect(applyAuth(model, base, 'test-secret')).toEqual({
      url: 'https://api.test/v1',
      headers: ['Authorization: Bearer test-secret', 'Content-Type: application/json'],
      body: '{"text":"hi"}',
    });
  });

  it('uses a custom header name and keeps an existing content type', () => {
    const model: ModelConfig = { vendor: 'anthropic', requirements: { auth: { key_name: 'x-api-key' } } };
    const result = applyAuth(model, { ...base, headers: ['content-type: application/json'] }, 'test-secret');
    expect(result.headers).toEqual(['content-type: application/json', 'x-api-key: test-secret']);
  });

  it('merges the key into a JSON body', () => {
    const model: ModelConfig = { vendor: 'deepl', requirements: { auth: { type: 'form', key_name: 'auth_key' } } };
    expect(applyAuth(model, base, 'test-secret').body).toBe('{"text":"hi","auth_key":"test-secret"}');
  });

  it('appends the key to a form body', () => {
    const model: ModelConfig = {
      vendor: 'deepl',
      requirements: { auth: { type: 'form', key_name: 'auth_key' }, body_type: 'form' },
    };
    const result = applyAuth(model, { ...base, body: 'text=hi' }, 'test secret');
    expect(result.body).toBe('text=hi&auth_key=test%20secret');
    expect(result.headers).toEqual(['Content-Type: application/x-www-form-urlencoded']);
  });

  it('adds the key to the query string', () => {
    const model: ModelConfig = { vendor: 'google', requirements: { auth: { type: 'query', key_name: 'key' } } };
    expect(applyAuth(model, base, 'test-secret').url).toBe('https://api.test/v1?key=test-secret');
    expect(applyAuth(model, { ...base, url: 'https://api.test/v1?alt=json' }, 'test-secret').url).toBe(
      'https://api.test/v1?alt=json&key=test-secret',
    );
  });

  it('refuses to add a field to a non-object JSON body', () => {
    const model: ModelConfig = { vendor: 'deepl', requirements: { auth: { type: 'form', key_name: 'auth_key' } } };
    expect(() => applyAuth(model, { ...base, body: '[1]' }, 'test-secret')).toThrow(
      "Cannot add field 'auth_key' to a non-object JSON body",
    );
  });
});

import { ProxyAgent, fetch as undiciFetch } from 'undici';
import { errorMessage, TransportError } from './errors.js';

export interface HttpRequest {
  method: string;
  url: string;
  body?: string;
  /** `Name: value` lines */
  headers?: string[];
  /** Substrings replaced by `***` in the debug output */
  maskPatterns?: string[];
  /** Proxy URI, e.g. `http://127.0.0.1:8080` */
  proxy?: string | null;
  dryRun?: boolean;
  verbose?: boolean;
}

export interface HttpResponse {
  /** 0 on dry run */
  status: number;
  headers: Record<string, string[]>;
  body: string;
  debugRequest: string;
  debugResponse: string;
}

/**
 * Transport used by the pipeline. HTTP error statuses resolve normally;
 * only network failures reject.
 */
export interface HttpClient {
  request(request: HttpRequest): Promise<HttpResponse>;
}

export interface FetchHttpClientOptions {
  /** Abort the request after this many ms (no limit when unset) */
  timeoutMs?: number;
}

interface HeaderSource {
  forEach(callback: (value: string, name: string) => void): void;
}

interface RawResponse {
  status: number;
  headers: Record<string, string[]>;
  body: string;
}

export const DRY_RUN_BODY = '[dry-run]';

export function maskSecrets(text: string, patterns: readonly string[]): string {
  return patterns.reduce((masked, pattern) => (pattern === '' ? masked : masked.split(pattern).join('***')), text);
}

function parseHeaderLines(lines: readonly string[]): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const line of lines) {
    const separator = line.indexOf(':');
    if (separator <= 0) {
      continue;
    }
    pairs.push([line.slice(0, separator).trim(), line.slice(separator + 1).trim()]);
  }
  return pairs;
}

function collectHeaders(source: HeaderSource): Record<string, string[]> {
  const headers: Record<string, string[]> = {};
  source.forEach((value, name) => {
    const existing = headers[name];
    if (existing) {
      existing.push(value);
    } else {
      headers[name] = [value];
    }
  });
  return headers;
}

function describeNetworkError(error: unknown): string {
  const message = errorMessage(error);
  if (error instanceof Error && error.cause !== undefined) {
    return `${message} (${errorMessage(error.cause)})`;
  }
  return message;
}

export function formatRequestPreview(
  title: string,
  method: string,
  url: string,
  headers: readonly string[],
  body: string,
): string {
  let preview = `\n${title}\n${method} ${url}\n\nHeaders:\n`;
  for (const header of headers) {
    preview += `  ${header}\n`;
  }
  if (body !== '') {
    preview += `\nBody:\n${body}\n\n`;
  }
  return preview;
}

export function formatResponseLog(status: number, headers: Record<string, string[]>, body: string): string {
  let log = `\nResponse (${status})\nHeaders:\n`;
  for (const [name, values] of Object.entries(headers)) {
    for (const value of values) {
      log += `  ${name}: ${value}\n`;
    }
  }
  return `${log}\nBody:\n${body}\n\n`;
}

/**
 * HttpClient over the global `fetch`. When a proxy is configured the request
 * goes through undici's `fetch` with a `ProxyAgent` dispatcher instead.
 */
export class FetchHttpClient implements HttpClient {
  private readonly timeoutMs?: number;

  constructor(options: FetchHttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const { method, url, dryRun = false, verbose = false } = request;
    const body = request.body ?? '';
    const headers = request.headers ?? [];
    const masks = request.maskPatterns ?? [];

    let debugRequest = '';
    if (verbose || dryRun) {
      debugRequest = formatRequestPreview(
        dryRun ? 'Dry-run: request (not sent)' : 'Verbose: request preview',
        method,
        maskSecrets(url, masks),
        headers.map((header) => maskSecrets(header, masks)),
        maskSecrets(body, masks),
      );
    }

    if (dryRun) {
      return { status: 0, headers: {}, body: DRY_RUN_BODY, debugRequest, debugResponse: '' };
    }

    let response: RawResponse;
    try {
      response = await this.fetchWithTimeout(url, {
        method,
        headers: parseHeaderLines(headers),
        body: method === 'GET' || method === 'HEAD' ? undefined : body,
        proxy: request.proxy ?? undefined,
      });
    } catch (error) {
      throw new TransportError(`Network error: ${describeNetworkError(error)}`, { cause: error });
    }

    let debugResponse = '';
    if (verbose) {
      const maskedHeaders = Object.fromEntries(
        Object.entries(response.headers).map(([name, values]) => [
          name,
          values.map((value) => maskSecrets(value, masks)),
        ]),
      );
      debugResponse = formatResponseLog(response.status, maskedHeaders, maskSecrets(response.body, masks));
    }

    return { ...response, debugRequest, debugResponse };
  }

  private async fetchWithTimeout(
    url: string,
    init: { method: string; headers: Array<[string, string]>; body: string | undefined; proxy: string | undefined },
  ): Promise<RawResponse> {
    const controller = new AbortController();
    const timer = this.timeoutMs !== undefined ? setTimeout(() => controller.abort(), this.timeoutMs) : undefined;

    try {
      if (init.proxy) {
        const dispatcher = new ProxyAgent(init.proxy);
        try {
          const response = await undiciFetch(url, {
            method: init.method,
            headers: init.headers,
            body: init.body,
            dispatcher,
            signal: controller.signal,
          });
          return { status: response.status, headers: collectHeaders(response.headers), body: await response.text() };
        } finally {
          await dispatcher.close();
        }
      }

      const response = await fetch(url, {
        method: init.method,
        headers: init.headers,
        body: init.body,
        signal: controller.signal,
      });
      return { status: response.status, headers: collectHeaders(response.headers), body: await response.text() };
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }
}

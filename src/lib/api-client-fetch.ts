/**
 * HTTP transport for the Gigasheet REST API (fetch-based)
 */

import { GigasheetApiError, NetworkError, errorMessage } from '../utils/errors.js';
import { retryWithBackoff } from '../utils/retry.js';
import { Logger, getLogger } from '../utils/logger.js';
import { isARealObject } from './validation.js';

const AUTH_HEADER = 'X-GIGASHEET-TOKEN';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface ApiClientConfig {
  baseUrl: string;
  apiKey: string;
  timeout?: number;
  maxRetries?: number;
  retryInitialDelay?: number;
  retryMaxDelay?: number;
  debug?: boolean;
}

export interface RequestOptions {
  body?: unknown;
  query?: Record<string, string | number | boolean>;
}

export class ApiClient {
  private baseUrl: string;
  private apiKey: string;
  private timeout: number;
  private maxRetries: number;
  private retryInitialDelay: number;
  private retryMaxDelay: number;
  private logger: Logger;

  constructor(config: ApiClientConfig) {
    this.baseUrl = config.baseUrl;
    this.apiKey = config.apiKey;
    this.timeout = config.timeout ?? 30000; // 30 seconds
    this.maxRetries = config.maxRetries ?? 2;
    this.retryInitialDelay = config.retryInitialDelay ?? 500;
    this.retryMaxDelay = config.retryMaxDelay ?? 5000;
    // An explicit debug flag logs even when the shared logger is quiet
    this.logger = config.debug ? new Logger(true) : getLogger();
  }

  /**
   * Resolve an endpoint against the API host
   * Both '/dataset/x' and 'dataset/x' land at the host root
   */
  buildUrl(path: string, query?: RequestOptions['query']): string {
    const url = new URL(path, this.baseUrl);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  /**
   * Issue a request. GETs are retried on transient failures, writes never are.
   */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    if (method !== 'GET') {
      return this.send(method, path, options);
    }

    return retryWithBackoff(() => this.send(method, path, options), {
      maxRetries: this.maxRetries,
      initialDelay: this.retryInitialDelay,
      maxDelay: this.retryMaxDelay,
    });
  }

  get(path: string, query?: RequestOptions['query']): Promise<unknown> {
    return this.request('GET', path, { query });
  }

  post(path: string, body: unknown): Promise<unknown> {
    return this.request('POST', path, { body });
  }

  put(path: string, body: unknown): Promise<unknown> {
    return this.request('PUT', path, { body });
  }

  delete(path: string, body: unknown): Promise<unknown> {
    return this.request('DELETE', path, { body });
  }

  /**
   * Make HTTP request with fetch
   */
  private async send(method: HttpMethod, path: string, options: RequestOptions): Promise<unknown> {
    const url = this.buildUrl(path, options.query);

    if (this.logger.isDebug) {
      this.logger.debug(`HTTP Request: ${method} ${url}`, { body: summarizeBody(options.body) });
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers: {
          [AUTH_HEADER]: this.apiKey,
          // Required by the API even when there is no body
          'Content-Type': 'application/json',
        },
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new NetworkError(`Request timeout after ${this.timeout}ms`, error);
      }
      throw new NetworkError(
        `Network request failed: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (this.logger.isDebug) {
      this.logger.debug(`HTTP Response: ${response.status}`, { bytes: text.length });
    }

    if (!response.ok) {
      throw new GigasheetApiError(describeFailure(method, path, response, text), response.status, text);
    }

    if (text.trim() === '') {
      return null;
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new NetworkError(`Invalid JSON in response to ${method} ${path}: ${errorMessage(error)}`);
    }
  }
}

function describeFailure(method: HttpMethod, path: string, response: Response, text: string): string {
  const base = `${method} ${path} failed with status ${response.status}`;
  const detail = readErrorDetail(text);
  return detail ? `${base}: ${detail}` : base;
}

function readErrorDetail(text: string): string | null {
  const trimmed = text.trim();
  if (!trimmed) return null;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (isARealObject(parsed)) {
      if (typeof parsed['message'] === 'string') return parsed['message'];
      if (typeof parsed['error'] === 'string') return parsed['error'];
    }
  } catch {
    // Not JSON, use the raw text
  }
  return trimmed;
}

/**
 * Upload bodies carry whole files; keep debug output readable
 */
function summarizeBody(body: unknown): unknown {
  if (typeof body !== 'object' || body === null || !('contents' in body)) {
    return body;
  }
  const { contents, ...rest } = body;
  return { ...rest, contents: typeof contents === 'string' ? `<${contents.length} base64 chars>` : contents };
}

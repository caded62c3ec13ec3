/**
 * Shared test helpers: a fetch stand-in that records calls, and a
 * reporter that records output instead of drawing spinners.
 */

import { vi } from 'vitest';
import { Gigasheet } from '../src/gigasheet.js';
import type { GigasheetConfig } from '../src/types/config.js';
import type { Reporter } from '../src/cli/reporter.js';

export const TEST_API_KEY = 'test-api-key';
export const HANDLE = 'd0966d5f_b668_44c5_8536_ae1f89ca8d37';
export const SAMPLE_FILE = 'test/fixtures/sample-local-upload.csv';
// base64 of the sample file contents "not,real\ntest,file"
export const SAMPLE_FILE_BASE64 = 'bm90LHJlYWwKdGVzdCxmaWxl';

export interface RecordedCall {
  method: string;
  url: string;
  headers: Headers;
  body: unknown;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(text: string, status: number): Response {
  return new Response(text, { status });
}

/**
 * Replace global fetch. The responder builds a fresh Response per call,
 * since a Response body can only be read once.
 */
export function stubFetch(responder: (call: RecordedCall) => Response | Promise<Response>) {
  const calls: RecordedCall[] = [];
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const call: RecordedCall = {
      method: init?.method ?? 'GET',
      url,
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    };
    calls.push(call);
    return responder(call);
  });
  vi.stubGlobal('fetch', fetchMock);
  return { calls, fetchMock };
}

export function createClient(overrides: GigasheetConfig = {}): Gigasheet {
  return new Gigasheet({
    apiKey: TEST_API_KEY,
    apiBaseUrl: 'https://api.gigasheet.com',
    uiBaseUrl: 'https://app.gigasheet.com',
    maxRetries: 0,
    ...overrides,
  });
}

export interface RecordingReporter extends Reporter {
  tasks: string[];
  notes: string[];
  results: string[];
}

export function createRecordingReporter(): RecordingReporter {
  const tasks: string[] = [];
  const notes: string[] = [];
  const results: string[] = [];
  return {
    tasks,
    notes,
    results,
    async task<T>(text: string, fn: () => Promise<T>, done?: (result: T) => string): Promise<T> {
      const result = await fn();
      tasks.push(done ? done(result) : text);
      return result;
    },
    note(message: string) {
      notes.push(message);
    },
    result(message: string) {
      results.push(message);
    },
  };
}

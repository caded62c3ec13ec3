import { describe, it, expect, vi } from 'vitest';
import { ApiClient } from '../../src/lib/api-client-fetch.js';
import { GigasheetApiError, NetworkError } from '../../src/utils/errors.js';
import { jsonResponse, stubFetch, textResponse, TEST_API_KEY } from '../helpers.js';

function createApi(overrides: Partial<ConstructorParameters<typeof ApiClient>[0]> = {}) {
  return new ApiClient({
    baseUrl: 'https://api.gigasheet.com',
    apiKey: TEST_API_KEY,
    maxRetries: 0,
    retryInitialDelay: 0,
    retryMaxDelay: 0,
    ...overrides,
  });
}

describe('ApiClient.buildUrl', () => {
  it('resolves paths with and without a leading slash at the host root', () => {
    const api = createApi();
    expect(api.buildUrl('/dataset/abc')).toBe('https://api.gigasheet.com/dataset/abc');
    expect(api.buildUrl('dataset/abc/download-export')).toBe(
      'https://api.gigasheet.com/dataset/abc/download-export'
    );
  });

  it('appends query parameters', () => {
    expect(createApi().buildUrl('/dataset/abc/columns', { showHidden: true })).toBe(
      'https://api.gigasheet.com/dataset/abc/columns?showHidden=true'
    );
  });
});

describe('ApiClient.request', () => {
  it('sends the token and JSON content type on every request', async () => {
    const { calls } = stubFetch(() => jsonResponse({ ok: true }));

    await createApi().get('/filter-templates');

    expect(calls).toHaveLength(1);
    expect(calls[0].method).toBe('GET');
    expect(calls[0].headers.get('X-GIGASHEET-TOKEN')).toBe(TEST_API_KEY);
    expect(calls[0].headers.get('Content-Type')).toBe('application/json');
    expect(calls[0].body).toBeUndefined();
  });

  it('serializes bodies, including on DELETE', async () => {
    const { calls } = stubFetch(() => jsonResponse({}));

    await createApi().delete('/dataset/abc/deduplicate-rows', { columns: ['B'] });

    expect(calls[0].method).toBe('DELETE');
    expect(calls[0].body).toEqual({ columns: ['B'] });
  });

  it('resolves parsed JSON', async () => {
    stubFetch(() => jsonResponse({ Handle: 'h1' }));
    await expect(createApi().post('/upload/url', {})).resolves.toEqual({ Handle: 'h1' });
  });

  it('resolves null for an empty body', async () => {
    stubFetch(() => new Response('', { status: 200 }));
    await expect(createApi().put('/dataset/abc/note', { note: 'x' })).resolves.toBeNull();
  });

  it('raises GigasheetApiError with the status and raw body', async () => {
    stubFetch(() => textResponse('{"message":"Sheet has been deleted"}', 400));

    const error = await createApi().get('/dataset/abc').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GigasheetApiError);
    if (!(error instanceof GigasheetApiError)) return;
    expect(error.statusCode).toBe(400);
    expect(error.responseText).toBe('{"message":"Sheet has been deleted"}');
    expect(error.message).toBe('GET /dataset/abc failed with status 400: Sheet has been deleted');
  });

  it('uses raw text in the message when the error body is not JSON', async () => {
    stubFetch(() => textResponse('Forbidden', 403));
    await expect(createApi().get('/dataset/abc')).rejects.toThrow(
      'GET /dataset/abc failed with status 403: Forbidden'
    );
  });

  it('wraps fetch failures in NetworkError', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));
    await expect(createApi().get('/dataset/abc')).rejects.toThrow('Network request failed: fetch failed');
  });

  it('reports aborts as timeouts', async () => {
    const abortError = new Error('aborted');
    abortError.name = 'AbortError';
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(abortError));

    const error = await createApi({ timeout: 50 }).get('/dataset/abc').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toHaveProperty('message', 'Request timeout after 50ms');
  });

  it('retries GET requests on 5xx', async () => {
    let n = 0;
    const { calls } = stubFetch(() => (++n < 3 ? textResponse('busy', 503) : jsonResponse({ Status: 'processed' })));

    await expect(createApi({ maxRetries: 2 }).get('/dataset/abc')).resolves.toEqual({ Status: 'processed' });
    expect(calls).toHaveLength(3);
  });

  it('does not retry GET requests on 4xx', async () => {
    const { calls } = stubFetch(() => textResponse('missing', 404));

    await expect(createApi({ maxRetries: 2 }).get('/dataset/abc')).rejects.toBeInstanceOf(GigasheetApiError);
    expect(calls).toHaveLength(1);
  });

  it('never retries writes', async () => {
    const { calls } = stubFetch(() => textResponse('busy', 503));

    await expect(createApi({ maxRetries: 2 }).post('/upload/url', {})).rejects.toBeInstanceOf(GigasheetApiError);
    expect(calls).toHaveLength(1);
  });
});

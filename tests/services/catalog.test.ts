import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Agent } from 'undici';
import {
  CatalogFetcher,
  filterByPrefixes,
  normalizeModelName,
  toOpenAIModelList,
  type CatalogOptions,
} from '../../src/services/catalog.js';
import { VertexEndpoints } from '../../src/lib/endpoints.js';
import { createDispatcher, createHttpClient } from '../../src/lib/http-client.js';
import { CatalogError } from '../../src/lib/errors.js';
import type { TokenProvider } from '../../src/services/token-manager.js';
import {
  dropConnection,
  sendJson,
  startUpstream,
  type StubUpstream,
  type UpstreamHandler,
} from '../helpers/upstream.js';

const PREFIXES = ['google/gemini-', 'anthropic/claude-', 'meta/llama'];

const tokens: TokenProvider = { getToken: async () => 'test-token' };

function publisherOf(url: string): string {
  const match = /^\/v1beta1\/publishers\/([^/]+)\/models$/.exec(url);
  return match ? match[1] : '';
}

function modelsOf(...names: string[]): { publisherModels: { name: string }[] } {
  return { publisherModels: names.map((name) => ({ name })) };
}

describe('model name helpers', () => {
  it('should normalize a well-formed resource name', () => {
    expect(normalizeModelName('publishers/google/models/gemini-1.5-pro')).toEqual({
      id: 'google/gemini-1.5-pro',
      ownedBy: 'google',
    });
  });

  it('should reject malformed names', () => {
    expect(normalizeModelName('publishers/x/bad/y')).toBeNull();
    expect(normalizeModelName('publishers/google/models')).toBeNull();
    expect(normalizeModelName('publishers//models/m')).toBeNull();
    expect(normalizeModelName('models/google/publishers/m')).toBeNull();
    expect(normalizeModelName('publishers/google/models/m/extra')).toBeNull();
  });

  it('should filter by prefix', () => {
    const entries = [
      { id: 'google/gemini-1.5-pro', ownedBy: 'google' },
      { id: 'google/imagen-3', ownedBy: 'google' },
      { id: 'anthropic/claude-3-5-sonnet', ownedBy: 'anthropic' },
      { id: 'meta/llama3-405b', ownedBy: 'meta' },
    ];
    expect(filterByPrefixes(entries, PREFIXES).map((entry) => entry.id)).toEqual([
      'google/gemini-1.5-pro',
      'anthropic/claude-3-5-sonnet',
      'meta/llama3-405b',
    ]);
  });

  it('should build an OpenAI model list', () => {
    expect(toOpenAIModelList([{ id: 'meta/llama3-405b', ownedBy: 'meta' }])).toEqual({
      object: 'list',
      data: [{ id: 'meta/llama3-405b', object: 'model', owned_by: 'meta' }],
    });
  });
});

describe('CatalogFetcher', () => {
  let upstream: StubUpstream | undefined;
  let dispatcher: Agent;

  async function createFetcher(
    handler: UpstreamHandler,
    overrides: Partial<CatalogOptions> = {}
  ): Promise<CatalogFetcher> {
    upstream = await startUpstream(handler);
    return new CatalogFetcher({
      tokens,
      endpoints: new VertexEndpoints({
        projectId: 'my-project',
        location: 'us-central1',
        endpointId: 'openapi',
        baseUrl: upstream.baseUrl,
      }),
      client: createHttpClient(dispatcher),
      publishers: ['google', 'anthropic', 'meta'],
      prefixes: PREFIXES,
      filter: true,
      retry: { delayMs: 10 },
      ...overrides,
    });
  }

  function requestsFor(publisher: string): number {
    return upstream?.requests.filter((request) => publisherOf(request.url) === publisher).length ?? 0;
  }

  beforeEach(() => {
    dispatcher = createDispatcher();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    await dispatcher.destroy();
    await upstream?.close();
    upstream = undefined;
    vi.restoreAllMocks();
  });

  const catalog: Record<string, string[]> = {
    google: ['publishers/google/models/gemini-1.5-pro', 'publishers/google/models/imagen-3'],
    anthropic: ['publishers/anthropic/models/claude-3-5-sonnet'],
    meta: ['publishers/meta/models/llama3-405b'],
  };

  const healthy: UpstreamHandler = (_req, res, recorded) => {
    sendJson(res, 200, modelsOf(...(catalog[publisherOf(recorded.url)] ?? [])));
  };

  it('should query every publisher once with upstream credentials', async () => {
    const fetcher = await createFetcher(healthy);

    await fetcher.listModels();

    expect(upstream?.requests.map((request) => request.url).sort()).toEqual([
      '/v1beta1/publishers/anthropic/models',
      '/v1beta1/publishers/google/models',
      '/v1beta1/publishers/meta/models',
    ]);
    for (const request of upstream?.requests ?? []) {
      expect(request.method).toBe('GET');
      expect(request.headers.authorization).toBe('Bearer test-token');
      expect(request.headers['x-goog-user-project']).toBe('my-project');
    }
  });

  it('should merge publishers in order and apply the prefix filter', async () => {
    const fetcher = await createFetcher(healthy);

    await expect(fetcher.listModels()).resolves.toEqual([
      { id: 'google/gemini-1.5-pro', ownedBy: 'google' },
      { id: 'anthropic/claude-3-5-sonnet', ownedBy: 'anthropic' },
      { id: 'meta/llama3-405b', ownedBy: 'meta' },
    ]);
  });

  it('should return everything when filtering is disabled', async () => {
    const fetcher = await createFetcher(healthy, { filter: false });

    const models = await fetcher.listModels();

    expect(models.map((model) => model.id)).toEqual([
      'google/gemini-1.5-pro',
      'google/imagen-3',
      'anthropic/claude-3-5-sonnet',
      'meta/llama3-405b',
    ]);
  });

  it('should not filter when the prefix list is empty', async () => {
    const fetcher = await createFetcher(healthy, { prefixes: [] });
    await expect(fetcher.listModels()).resolves.toHaveLength(4);
  });

  it('should retry transport errors and succeed on the third attempt', async () => {
    let googleAttempts = 0;
    const fetcher = await createFetcher((req, res, recorded) => {
      if (publisherOf(recorded.url) === 'google' && ++googleAttempts <= 2) {
        dropConnection(req);
        return;
      }
      healthy(req, res, recorded, 0);
    });

    const models = await fetcher.listModels();

    expect(requestsFor('google')).toBe(3);
    expect(models.map((model) => model.id)).toContain('google/gemini-1.5-pro');
  });

  it('should wait 200ms between attempts by default', async () => {
    let attempts = 0;
    const fetcher = await createFetcher(
      (req, res, recorded) => {
        if (++attempts <= 2) {
          dropConnection(req);
          return;
        }
        healthy(req, res, recorded, 0);
      },
      { publishers: ['meta'], retry: undefined }
    );

    const start = Date.now();
    await expect(fetcher.listModels()).resolves.toEqual([{ id: 'meta/llama3-405b', ownedBy: 'meta' }]);

    expect(Date.now() - start).toBeGreaterThanOrEqual(390);
  });

  it('should use the default attempt count when the override leaves it unset', async () => {
    const fetcher = await createFetcher(
      (req) => dropConnection(req),
      { publishers: ['meta'], retry: { maxRetries: undefined, delayMs: 10 } }
    );

    await expect(fetcher.listModels()).resolves.toEqual([]);
    expect(requestsFor('meta')).toBe(3);
  });

  it('should give up after three attempts and keep the other publishers', async () => {
    const fetcher = await createFetcher((req, res, recorded) => {
      if (publisherOf(recorded.url) === 'anthropic') {
        dropConnection(req);
        return;
      }
      healthy(req, res, recorded, 0);
    });

    const models = await fetcher.listModels();

    expect(requestsFor('anthropic')).toBe(3);
    expect(models).toEqual([
      { id: 'google/gemini-1.5-pro', ownedBy: 'google' },
      { id: 'meta/llama3-405b', ownedBy: 'meta' },
    ]);
  });

  it('should not retry an HTTP error status', async () => {
    const fetcher = await createFetcher((req, res, recorded) => {
      if (publisherOf(recorded.url) === 'meta') {
        sendJson(res, 429, { error: { message: 'Quota exceeded' } });
        return;
      }
      healthy(req, res, recorded, 0);
    });

    const models = await fetcher.listModels();

    expect(requestsFor('meta')).toBe(1);
    expect(models.map((model) => model.id)).toEqual(['google/gemini-1.5-pro', 'anthropic/claude-3-5-sonnet']);
  });

  it('should skip malformed names and tolerate a missing list', async () => {
    const fetcher = await createFetcher(
      (_req, res, recorded) => {
        const publisher = publisherOf(recorded.url);
        if (publisher === 'google') {
          sendJson(res, 200, modelsOf('publishers/x/bad/y', 'publishers/google/models/gemini-2.0-flash'));
          return;
        }
        sendJson(res, 200, {});
      },
      { filter: false }
    );

    await expect(fetcher.listModels()).resolves.toEqual([
      { id: 'google/gemini-2.0-flash', ownedBy: 'google' },
    ]);
  });

  it('should fail without a token and make no upstream calls', async () => {
    const fetcher = await createFetcher(healthy, {
      tokens: { getToken: async () => undefined },
    });

    await expect(fetcher.listModels()).rejects.toBeInstanceOf(CatalogError);
    expect(upstream?.requests).toHaveLength(0);
  });
});

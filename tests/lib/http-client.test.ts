import { describe, it, expect, afterEach } from 'vitest';
import { FetchError } from 'ofetch';
import type { Agent } from 'undici';
import {
  UPSTREAM_TIMEOUTS,
  createDispatcher,
  createHttpClient,
  isAbortError,
  isTransportError,
} from '../../src/lib/http-client.js';
import { startUpstream, type StubUpstream } from '../helpers/upstream.js';

const HEADER_DELAY_MS = 1500;

describe('UPSTREAM_TIMEOUTS', () => {
  it('should disable header and body timeouts', () => {
    expect(UPSTREAM_TIMEOUTS).toEqual({ headersTimeout: 0, bodyTimeout: 0 });
  });
});

describe('createHttpClient', () => {
  let upstream: StubUpstream | undefined;
  let dispatcher: Agent | undefined;
  const timers: NodeJS.Timeout[] = [];

  async function startSlowUpstream(): Promise<StubUpstream> {
    upstream = await startUpstream((_req, res) => {
      timers.push(
        setTimeout(() => {
          res.writeHead(200, { 'content-type': 'text/plain' });
          res.end('late');
        }, HEADER_DELAY_MS)
      );
    });
    return upstream;
  }

  afterEach(async () => {
    for (const timer of timers.splice(0)) {
      clearTimeout(timer);
    }
    await dispatcher?.destroy();
    dispatcher = undefined;
    await upstream?.close();
    upstream = undefined;
  });

  it('should route requests through the given dispatcher', async () => {
    const { baseUrl } = await startSlowUpstream();
    dispatcher = createDispatcher({ headersTimeout: 100 });
    const client = createHttpClient(dispatcher);

    const error = await client.raw(`${baseUrl}/slow`, { ignoreResponseError: true }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(isTransportError(error)).toBe(true);
  }, 10_000);

  it('should wait for slow upstream headers with the default dispatcher', async () => {
    const { baseUrl } = await startSlowUpstream();
    dispatcher = createDispatcher();
    const client = createHttpClient(dispatcher);

    const response = await client.raw(`${baseUrl}/slow`, { responseType: 'text' });

    expect(response.status).toBe(200);
    expect(response._data).toBe('late');
  }, 10_000);
});

describe('error classifiers', () => {
  it('should treat a FetchError with a response as an HTTP error', () => {
    const error = new FetchError('[GET] "http://upstream": 503');
    expect(isTransportError(error)).toBe(true);
    Object.defineProperty(error, 'response', { value: new Response(null, { status: 503 }) });
    expect(isTransportError(error)).toBe(false);
  });

  it('should not treat non-Error values as transport errors', () => {
    expect(isTransportError({ status: 503 })).toBe(false);
  });

  it('should detect aborts directly or through the cause', () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    expect(isAbortError(abort)).toBe(true);
    expect(isAbortError(new Error('fetch failed', { cause: abort }))).toBe(true);
    expect(isAbortError(new Error('fetch failed'))).toBe(false);
  });
});

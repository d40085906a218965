/**
 * Proxy Forwarder
 * 將入站的 chat completions 請求改寫後轉發到 Vertex AI，並逐塊串流回應
 *
 * 請求生命週期：
 * 1. 向 TokenManager 取得 token；取不到就立即失敗，絕不無 token 轉發
 * 2. 移除 host / authorization / content-length 等連線層標頭，注入新的 Authorization
 * 3. 請求本文以串流方式送出（不先讀完）
 * 4. 先取得 upstream 的狀態碼與 content-type，再開始交出本文區塊
 *
 * 串流回應不可重送，因此這裡不做任何重試，也不設整體逾時。
 */

import type { IncomingHttpHeaders } from 'node:http';
import type { Readable } from 'node:stream';
import { ProxyError } from '../lib/errors.js';
import { formatBearer } from '../lib/authorization.js';
import { isAbortError, type HttpClient } from '../lib/http-client.js';
import { loggers, toError } from '../lib/logger.js';
import { proxyUpstreamErrorsTotal, recordProxyRequest } from '../lib/metrics.js';
import type { VertexEndpoints } from '../lib/endpoints.js';
import type { TokenProvider } from './token-manager.js';

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

/**
 * 不轉發的入站標頭：連線層或分框相關，轉發會洩漏或與 upstream 連線衝突
 */
const STRIPPED_HEADERS = new Set([
  'host',
  'authorization',
  'content-length',
  'connection',
  'keep-alive',
  'proxy-connection',
  'transfer-encoding',
  'upgrade',
  'expect',
]);

export interface ProxyRequest {
  method: string;
  /** 原始 query string（不含 ?） */
  query: string;
  headers: IncomingHttpHeaders;
  /** GET / HEAD 沒有本文 */
  body?: Readable;
  /** 入站連線中斷時中止 upstream 請求 */
  signal?: AbortSignal;
  requestId?: string;
}

export interface ProxyResult {
  status: number;
  contentType: string;
  body: AsyncIterable<Uint8Array>;
}

/**
 * 串流事件：先一個 head，之後是零到多個 chunk
 */
export type StreamEvent =
  | { kind: 'head'; status: number; contentType: string }
  | { kind: 'chunk'; data: Uint8Array };

export interface ProxyForwarderOptions {
  tokens: TokenProvider;
  endpoints: VertexEndpoints;
  client: HttpClient;
}

const logger = loggers.proxy;

/**
 * 產生 upstream 請求標頭
 */
export function buildUpstreamHeaders(
  headers: IncomingHttpHeaders,
  token: string
): Record<string, string> {
  const result: Record<string, string> = {};

  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    if (value === undefined || STRIPPED_HEADERS.has(lower)) {
      continue;
    }
    result[lower] = Array.isArray(value) ? value.join(', ') : value;
  }

  result.authorization = formatBearer(token);
  return result;
}

/**
 * 只交出 chunk 事件的本文
 */
async function* bodyChunks(events: AsyncGenerator<StreamEvent>): AsyncGenerator<Uint8Array> {
  for await (const event of events) {
    if (event.kind === 'chunk') {
      yield event.data;
    }
  }
}

export class ProxyForwarder {
  private tokens: TokenProvider;
  private endpoints: VertexEndpoints;
  private client: HttpClient;

  constructor(options: ProxyForwarderOptions) {
    this.tokens = options.tokens;
    this.endpoints = options.endpoints;
    this.client = options.client;
  }

  /**
   * 轉發請求；回傳時狀態碼與 content-type 已確定，本文尚未開始讀取
   */
  async forward(request: ProxyRequest): Promise<ProxyResult> {
    const token = await this.tokens.getToken();
    if (!token) {
      logger.error('No valid token for proxy request', null, { requestId: request.requestId });
      throw new ProxyError('Failed to obtain token', 'NO_TOKEN');
    }

    const target = this.endpoints.chatCompletions(request.query);
    const headers = buildUpstreamHeaders(request.headers, token);
    logger.info('Forwarding request', {
      requestId: request.requestId,
      method: request.method,
      url: target,
    });

    const startTime = Date.now();
    const events = this.stream(request.method, target, headers, request.body, request.signal);

    let first: IteratorResult<StreamEvent>;
    try {
      first = await events.next();
    } catch (error) {
      if (!isAbortError(error)) {
        proxyUpstreamErrorsTotal.inc({ stage: 'connect' });
        logger.error('Upstream request failed', toError(error), {
          requestId: request.requestId,
          url: target,
        });
      }
      throw new ProxyError('Upstream request failed', 'UPSTREAM_UNREACHABLE', error);
    }

    if (first.done || first.value.kind !== 'head') {
      throw new ProxyError('Upstream response ended before headers', 'UPSTREAM_UNREACHABLE');
    }

    const { status, contentType } = first.value;
    const timeToHead = Date.now() - startTime;
    recordProxyRequest(request.method, status, timeToHead);
    logger.info('Upstream responded', {
      requestId: request.requestId,
      statusCode: status,
      contentType,
      duration: timeToHead,
    });

    return {
      status,
      contentType,
      body: bodyChunks(events),
    };
  }

  /**
   * 產生串流事件：head 一次，接著逐塊 chunk
   */
  private async *stream(
    method: string,
    target: string,
    headers: Record<string, string>,
    body: Readable | undefined,
    signal: AbortSignal | undefined
  ): AsyncGenerator<StreamEvent> {
    const response = await this.client.raw(target, {
      method,
      headers,
      body,
      signal,
      responseType: 'stream',
      ignoreResponseError: true,
      retry: 0,
    });

    yield {
      kind: 'head',
      status: response.status,
      contentType: response.headers.get('content-type') ?? DEFAULT_CONTENT_TYPE,
    };

    if (!response.body) {
      return;
    }

    const reader = response.body.getReader();
    let finished = false;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          finished = true;
          return;
        }
        if (value && value.byteLength > 0) {
          yield { kind: 'chunk', data: value };
        }
      }
    } catch (error) {
      if (!isAbortError(error)) {
        proxyUpstreamErrorsTotal.inc({ stage: 'stream' });
      }
      throw error;
    } finally {
      if (!finished) {
        // 消費端提前結束：釋放 upstream 連線
        await reader.cancel().catch((error: unknown) => {
          logger.debug('Upstream body cancel failed', { reason: toError(error).message });
        });
      }
    }
  }
}

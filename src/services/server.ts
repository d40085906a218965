/**
 * HTTP Front
 * node:http 伺服器：驗證入站 Bearer 金鑰，分派到 ProxyForwarder / CatalogFetcher
 *
 * 路由（皆可加 /v1 前綴）：
 *   GET      /                  存活檢查，不驗證
 *   GET|POST /chat/completions  代理到 Vertex AI
 *   GET      /models            OpenAI 格式的模型清單
 *   GET      /metrics           Prometheus 指標
 */

import http from 'node:http';
import type { AddressInfo } from 'node:net';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { checkAuthorization } from '../lib/authorization.js';
import { BridgeError, type BridgeErrorType } from '../lib/errors.js';
import { createRequestContext, loggers, toError } from '../lib/logger.js';
import { getMetricsContentType, getMetricsText } from '../lib/metrics.js';
import { toOpenAIModelList, type CatalogFetcher } from './catalog.js';
import type { ProxyForwarder } from './proxy.js';

export const LIVENESS_MESSAGE = 'Hello, this is Vertex Bridge!';

export type Route = 'root' | 'chat' | 'models' | 'metrics';

const ROUTE_METHODS: Record<Route, readonly string[]> = {
  root: ['GET'],
  chat: ['GET', 'POST'],
  models: ['GET'],
  metrics: ['GET'],
};

const ROUTE_PATHS: Record<string, Route> = {
  '/chat/completions': 'chat',
  '/models': 'models',
  '/metrics': 'metrics',
};

export interface BridgeServerOptions {
  /** 入站金鑰，空字串表示不驗證 */
  key: string;
  enableModels: boolean;
  forwarder: Pick<ProxyForwarder, 'forward'>;
  catalog: Pick<CatalogFetcher, 'listModels'>;
}

const logger = loggers.server;

/**
 * 解析路徑；/v1 前綴與無前綴等價
 */
export function resolveRoute(pathname: string): Route | null {
  if (pathname === '/') {
    return 'root';
  }
  const stripped = pathname.startsWith('/v1/') ? pathname.slice(3) : pathname;
  return ROUTE_PATHS[stripped] ?? null;
}

/**
 * 拆出路徑與原始 query string（不做任何編碼轉換）
 */
export function splitRequestUrl(url: string | undefined): { pathname: string; query: string } {
  const raw = url ?? '/';
  const index = raw.indexOf('?');
  if (index === -1) {
    return { pathname: raw, query: '' };
  }
  return { pathname: raw.slice(0, index), query: raw.slice(index + 1) };
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    'content-type': 'application/json',
    'content-length': Buffer.byteLength(payload),
  });
  res.end(payload);
}

function sendError(
  res: http.ServerResponse,
  status: number,
  message: string,
  type: BridgeErrorType,
  extraHeaders: Record<string, string> = {}
): void {
  if (res.headersSent) {
    res.destroy();
    return;
  }
  for (const [name, value] of Object.entries(extraHeaders)) {
    res.setHeader(name, value);
  }
  sendJson(res, status, { error: { message, type } });
}

function isPrematureClose(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ERR_STREAM_PREMATURE_CLOSE';
}

export class BridgeServer {
  private server: http.Server;
  private options: BridgeServerOptions;
  private inflight = new Set<AbortController>();

  constructor(options: BridgeServerOptions) {
    this.options = options;
    this.server = http.createServer((req, res) => {
      this.handle(req, res).catch((error: unknown) => {
        logger.error('Unhandled request error', toError(error));
        sendError(res, 500, 'Internal Server Error', 'server_error');
      });
    });
  }

  /**
   * 取得底層 http.Server（測試用）
   */
  getServer(): http.Server {
    return this.server;
  }

  /**
   * 開始監聽
   */
  listen(port: number, host: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(error);
      };
      this.server.once('error', onError);
      this.server.listen(port, host, () => {
        this.server.off('error', onError);
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not listening on a TCP port'));
          return;
        }
        resolve(address);
      });
    });
  }

  /**
   * 停止接受連線，中止所有進行中的 upstream 請求並關閉閒置連線
   */
  async close(): Promise<void> {
    if (!this.server.listening) {
      return;
    }

    for (const controller of this.inflight) {
      controller.abort();
    }

    await new Promise<void>((resolve, reject) => {
      this.server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
      this.server.closeIdleConnections();
    });
    logger.info('Server closed');
  }

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = (req.method ?? 'GET').toUpperCase();
    const { pathname, query } = splitRequestUrl(req.url);
    const context = createRequestContext(method, pathname);
    const startTime = Date.now();

    res.on('finish', () => {
      logger.info('Request completed', {
        ...context,
        statusCode: res.statusCode,
        duration: Date.now() - startTime,
      });
    });

    const route = resolveRoute(pathname);
    if (route === null || (route === 'models' && !this.options.enableModels)) {
      sendError(res, 404, 'Not Found', 'not_found_error');
      return;
    }

    const allowed = ROUTE_METHODS[route];
    if (!allowed.includes(method)) {
      sendError(res, 405, 'Method Not Allowed', 'invalid_request_error', {
        allow: allowed.join(', '),
      });
      return;
    }

    if (route === 'root') {
      res.writeHead(200, { 'content-type': 'text/plain; charset=utf-8' });
      res.end(LIVENESS_MESSAGE);
      return;
    }

    // 在讀取任何本文之前驗證
    const auth = checkAuthorization(req.headers.authorization, this.options.key);
    if (!auth.ok) {
      logger.warn('Authorization rejected', { ...context, reason: auth.reason });
      sendError(res, 401, auth.reason, 'authentication_error');
      return;
    }

    try {
      switch (route) {
        case 'chat':
          await this.handleChat(req, res, method, query, context.requestId);
          return;
        case 'models':
          await this.handleModels(res, context.requestId);
          return;
        case 'metrics':
          await this.handleMetrics(res);
          return;
      }
    } catch (error) {
      if (error instanceof BridgeError) {
        sendError(res, error.statusCode, error.message, error.type);
        return;
      }
      throw error;
    }
  }

  private async handleChat(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    method: string,
    query: string,
    requestId: string | undefined
  ): Promise<void> {
    const controller = new AbortController();
    this.inflight.add(controller);
    res.on('close', () => {
      this.inflight.delete(controller);
      if (!res.writableFinished) {
        // 入站連線提前中斷：中止 upstream 以免連線外洩
        controller.abort();
      }
    });

    const hasBody = method !== 'GET' && method !== 'HEAD';
    const result = await this.options.forwarder.forward({
      method,
      query,
      headers: req.headers,
      body: hasBody ? req : undefined,
      signal: controller.signal,
      requestId,
    });

    res.writeHead(result.status, { 'content-type': result.contentType });
    res.flushHeaders();

    try {
      await pipeline(Readable.from(result.body), res);
    } catch (error) {
      if (controller.signal.aborted || isPrematureClose(error)) {
        logger.info('Client disconnected during stream', { requestId });
      } else {
        logger.error('Upstream stream failed', toError(error), { requestId });
      }
      // 串流中途失敗：直接中斷回應
      res.destroy();
    }
  }

  private async handleModels(res: http.ServerResponse, requestId: string | undefined): Promise<void> {
    const entries = await this.options.catalog.listModels(requestId);
    sendJson(res, 200, toOpenAIModelList(entries));
  }

  private async handleMetrics(res: http.ServerResponse): Promise<void> {
    const text = await getMetricsText();
    res.writeHead(200, { 'content-type': getMetricsContentType() });
    res.end(text);
  }
}

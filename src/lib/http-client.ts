/**
 * Outbound HTTP Client
 * 代理與模型清單共用同一個 ofetch 實例與同一個 undici 連線池
 */

import { ofetch, FetchError, type $Fetch } from 'ofetch';
import { Agent, type Dispatcher } from 'undici';
import { VERSION } from './version.js';

/** 本專案實際用到的 ofetch 介面 */
export type HttpClient = Pick<$Fetch, 'raw'>;

/**
 * upstream 連線逾時；0 表示停用
 * Node 內建 fetch 的預設 dispatcher 會在 300 秒沒有標頭或本文時中斷連線
 */
export const UPSTREAM_TIMEOUTS = Object.freeze({
  headersTimeout: 0,
  bodyTimeout: 0,
});

export type UpstreamTimeouts = Partial<Pick<Agent.Options, 'headersTimeout' | 'bodyTimeout'>>;

/**
 * 建立連線池；擁有者負責在關閉時呼叫 close()
 */
export function createDispatcher(timeouts: UpstreamTimeouts = {}): Agent {
  return new Agent({
    headersTimeout: timeouts.headersTimeout ?? UPSTREAM_TIMEOUTS.headersTimeout,
    bodyTimeout: timeouts.bodyTimeout ?? UPSTREAM_TIMEOUTS.bodyTimeout,
  });
}

/**
 * 建立共用的 HTTP client
 * - 不自動重試（串流請求無法重送；模型清單自行控制重試）
 * - 所有請求走傳入的 dispatcher
 */
export function createHttpClient(dispatcher: Dispatcher): $Fetch {
  return ofetch.create({
    retry: 0,
    dispatcher,
    headers: {
      'user-agent': `vertex-bridge/${VERSION}`,
    },
  });
}

/**
 * 是否為傳輸層錯誤（連線失敗、逾時、中斷），而非 HTTP 錯誤狀態碼
 */
export function isTransportError(error: unknown): boolean {
  if (error instanceof FetchError) {
    return error.response === undefined;
  }
  return error instanceof Error;
}

/**
 * 是否為 AbortSignal 造成的中止
 */
export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === 'AbortError') {
    return true;
  }
  return error.cause instanceof Error && error.cause.name === 'AbortError';
}

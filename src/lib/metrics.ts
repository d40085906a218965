/**
 * Prometheus 指標收集
 * 追蹤 token 更新、代理轉發、模型清單與重試等各項指標
 */

import { register, Counter, Histogram } from 'prom-client';

/**
 * Token 指標
 */
export const tokenRefreshTotal = new Counter({
  name: 'bridge_token_refresh_total',
  help: 'Token 更新次數',
  labelNames: ['result'] // 'success' | 'failed' | 'skipped'
});

export const credentialFetchDurationSeconds = new Histogram({
  name: 'bridge_credential_fetch_duration_seconds',
  help: 'Credential Source 取得 token 的延遲（秒）',
  buckets: [0.05, 0.1, 0.25, 0.5, 1.0, 2.5, 5.0]
});

/**
 * 代理指標
 */
export const proxyRequestsTotal = new Counter({
  name: 'bridge_proxy_requests_total',
  help: '代理請求總數（依 upstream 狀態碼）',
  labelNames: ['method', 'status']
});

export const proxyUpstreamErrorsTotal = new Counter({
  name: 'bridge_proxy_upstream_errors_total',
  help: 'Upstream 連線或串流失敗次數',
  labelNames: ['stage'] // 'connect' | 'stream'
});

export const proxyTimeToHeadSeconds = new Histogram({
  name: 'bridge_proxy_time_to_head_seconds',
  help: '自轉發開始到收到 upstream 狀態列的時間（秒）',
  buckets: [0.1, 0.25, 0.5, 1.0, 2.5, 5.0, 10.0, 30.0]
});

/**
 * 模型清單指標
 */
export const catalogPartitionResultsTotal = new Counter({
  name: 'bridge_catalog_partition_results_total',
  help: '各 publisher 查詢結果',
  labelNames: ['publisher', 'result'] // 'ok' | 'http_error' | 'transport_error'
});

/**
 * 重試機制指標
 */
export const retryAttemptsTotal = new Counter({
  name: 'bridge_retry_attempts_total',
  help: '重試嘗試次數',
  labelNames: ['operation']
});

/**
 * 取得 Prometheus 文字格式輸出
 */
export async function getMetricsText(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * 重置所有指標（測試用）
 */
export function resetMetrics(): void {
  register.resetMetrics();
}

/**
 * 更新代理請求指標
 */
export function recordProxyRequest(method: string, status: number, timeToHeadMs: number): void {
  proxyRequestsTotal.inc({ method, status: String(status) });
  proxyTimeToHeadSeconds.observe(timeToHeadMs / 1000);
}

/**
 * 更新 token 更新指標
 */
export function recordTokenRefresh(result: 'success' | 'failed' | 'skipped', durationMs?: number): void {
  tokenRefreshTotal.inc({ result });
  if (durationMs !== undefined) {
    credentialFetchDurationSeconds.observe(durationMs / 1000);
  }
}

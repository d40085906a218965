import { describe, it, expect, beforeEach } from 'vitest';
import {
  getMetricsContentType,
  getMetricsText,
  recordProxyRequest,
  recordTokenRefresh,
  resetMetrics,
} from '../../src/lib/metrics.js';

describe('metrics', () => {
  beforeEach(() => {
    resetMetrics();
  });

  it('should count proxy requests by method and status', async () => {
    recordProxyRequest('POST', 200, 120);
    recordProxyRequest('POST', 200, 80);
    recordProxyRequest('POST', 429, 10);

    const text = await getMetricsText();

    expect(text).toContain('bridge_proxy_requests_total{method="POST",status="200"} 2');
    expect(text).toContain('bridge_proxy_requests_total{method="POST",status="429"} 1');
    expect(text).toContain('bridge_proxy_time_to_head_seconds_count 3');
  });

  it('should only observe fetch duration when one is given', async () => {
    recordTokenRefresh('skipped');
    recordTokenRefresh('success', 250);

    const text = await getMetricsText();

    expect(text).toContain('bridge_token_refresh_total{result="skipped"} 1');
    expect(text).toContain('bridge_token_refresh_total{result="success"} 1');
    expect(text).toContain('bridge_credential_fetch_duration_seconds_count 1');
    expect(text).toContain('bridge_credential_fetch_duration_seconds_sum 0.25');
  });

  it('should clear values on reset', async () => {
    recordProxyRequest('GET', 200, 5);
    resetMetrics();

    expect(await getMetricsText()).not.toContain('bridge_proxy_requests_total{method="GET",status="200"}');
  });

  it('should report the Prometheus text content type', () => {
    expect(getMetricsContentType()).toContain('text/plain');
  });
});

/**
 * Catalog Fetcher
 * 並行查詢各 publisher 的模型清單，彙整成 OpenAI 格式
 * - 傳輸層錯誤重試（共 3 次，間隔固定 200ms）；耗盡後該 publisher 貢獻 0 筆
 * - HTTP 非 200 不重試，記錄後貢獻 0 筆
 * - 名稱不是 publishers/{p}/models/{m} 的項目略過
 * - 前綴過濾在彙整之後進行，不影響查詢數量
 */

import type { FetchResponse } from 'ofetch';
import { CatalogError } from '../lib/errors.js';
import { formatBearer } from '../lib/authorization.js';
import type { HttpClient } from '../lib/http-client.js';
import { loggers, toError } from '../lib/logger.js';
import { catalogPartitionResultsTotal } from '../lib/metrics.js';
import type { VertexEndpoints } from '../lib/endpoints.js';
import { retry, RetryError, type RetryConfig } from './retry.js';
import type { TokenProvider } from './token-manager.js';
import type {
  ModelEntry,
  OpenAIModelList,
  PublisherModel,
  PublisherModelsResponse,
} from '../types/vertex.js';

export interface CatalogOptions {
  tokens: TokenProvider;
  endpoints: VertexEndpoints;
  client: HttpClient;
  publishers: string[];
  /** 空陣列或 filter 關閉時不過濾 */
  prefixes: string[];
  filter: boolean;
  retry?: Partial<Pick<RetryConfig, 'maxRetries' | 'delayMs'>>;
}

const logger = loggers.catalog;

/**
 * publishers/{publisher}/models/{model} → {publisher}/{model}
 * 格式不符時回傳 null
 */
export function normalizeModelName(name: string): ModelEntry | null {
  const parts = name.split('/');
  if (parts.length !== 4 || parts[0] !== 'publishers' || parts[2] !== 'models') {
    return null;
  }

  const [, publisher, , model] = parts;
  if (!publisher || !model) {
    return null;
  }

  return { id: `${publisher}/${model}`, ownedBy: publisher };
}

/**
 * 保留 id 以任一前綴開頭的項目
 */
export function filterByPrefixes(entries: ModelEntry[], prefixes: string[]): ModelEntry[] {
  return entries.filter((entry) => prefixes.some((prefix) => entry.id.startsWith(prefix)));
}

/**
 * 轉為 OpenAI 的 /models 回應格式
 */
export function toOpenAIModelList(entries: ModelEntry[]): OpenAIModelList {
  return {
    object: 'list',
    data: entries.map((entry) => ({
      id: entry.id,
      object: 'model',
      owned_by: entry.ownedBy,
    })),
  };
}

function isPublisherModelsResponse(value: unknown): value is PublisherModelsResponse {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function extractEntries(models: PublisherModel[]): ModelEntry[] {
  const entries: ModelEntry[] = [];
  for (const model of models) {
    if (typeof model?.name !== 'string') {
      continue;
    }
    const entry = normalizeModelName(model.name);
    if (entry) {
      entries.push(entry);
    }
  }
  return entries;
}

function describeBody(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  try {
    return JSON.stringify(data) ?? '';
  } catch {
    return String(data);
  }
}

export class CatalogFetcher {
  private options: CatalogOptions;

  constructor(options: CatalogOptions) {
    this.options = options;
  }

  /**
   * 取得所有 publisher 的模型（彙整並視設定過濾）
   * 只有取不到 token 時才失敗
   */
  async listModels(requestId?: string): Promise<ModelEntry[]> {
    const token = await this.options.tokens.getToken();
    if (!token) {
      logger.error('No valid token for models request', null, { requestId });
      throw new CatalogError('Failed to obtain token');
    }

    const { publishers } = this.options;
    logger.info('Fetching models', { requestId, publishers: publishers.length });

    const results = await Promise.all(
      publishers.map((publisher) => this.fetchPublisher(publisher, token, requestId))
    );
    const all = results.flat();

    if (!this.options.filter || this.options.prefixes.length === 0) {
      logger.info('Fetched models', { requestId, count: all.length });
      return all;
    }

    const filtered = filterByPrefixes(all, this.options.prefixes);
    logger.info('Fetched models', { requestId, count: filtered.length, total: all.length });
    return filtered;
  }

  /**
   * 查詢單一 publisher；任何失敗都轉為空陣列
   */
  private async fetchPublisher(
    publisher: string,
    token: string,
    requestId?: string
  ): Promise<ModelEntry[]> {
    const { endpoints, client } = this.options;
    const url = endpoints.publisherModels(publisher);

    let response: FetchResponse<PublisherModelsResponse>;
    try {
      response = await retry(
        () =>
          client.raw<PublisherModelsResponse>(url, {
            method: 'GET',
            headers: {
              'Content-Type': 'application/json',
              Authorization: formatBearer(token),
              'x-goog-user-project': endpoints.projectId,
            },
            ignoreResponseError: true,
            retry: 0,
          }),
        {
          maxRetries: this.options.retry?.maxRetries,
          delayMs: this.options.retry?.delayMs,
          operation: 'catalog',
          onRetry: (error, attempt, delayMs) => {
            logger.warn('Failed to fetch models for publisher, will retry', {
              requestId,
              publisher,
              attempt,
              delayMs,
              reason: toError(error).message,
            });
          },
        }
      );
    } catch (error) {
      const cause = error instanceof RetryError ? error.originalError : error;
      catalogPartitionResultsTotal.inc({ publisher, result: 'transport_error' });
      logger.warn('Failed to fetch models for publisher', {
        requestId,
        publisher,
        attempts: error instanceof RetryError ? error.attempts : 1,
        reason: toError(cause).message,
      });
      return [];
    }

    if (response.status !== 200) {
      catalogPartitionResultsTotal.inc({ publisher, result: 'http_error' });
      logger.warn('Failed to fetch models for publisher', {
        requestId,
        publisher,
        statusCode: response.status,
        body: describeBody(response._data),
      });
      return [];
    }

    const data: unknown = response._data;
    const models = isPublisherModelsResponse(data) && Array.isArray(data.publisherModels)
      ? data.publisherModels
      : [];

    catalogPartitionResultsTotal.inc({ publisher, result: 'ok' });
    logger.info('Fetched publisher models', {
      requestId,
      publisher,
      statusCode: response.status,
      count: models.length,
    });

    return extractEntries(models);
  }
}

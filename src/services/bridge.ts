/**
 * Bridge
 * 組裝各服務並管理生命週期：啟動時先更新 token、排程背景更新，再開始監聽；
 * 關閉時停止排程、中止進行中的 upstream 請求、關閉伺服器，最後關閉 upstream 連線池
 */

import type { AddressInfo } from 'node:net';
import type { Agent } from 'undici';
import { VertexEndpoints } from '../lib/endpoints.js';
import { createDispatcher, createHttpClient, type HttpClient } from '../lib/http-client.js';
import { loggers } from '../lib/logger.js';
import { CatalogFetcher } from './catalog.js';
import type { ConfigService } from './config.js';
import type { CredentialSource } from './credentials.js';
import { ProxyForwarder } from './proxy.js';
import { BridgeServer } from './server.js';
import { TokenManager } from './token-manager.js';

const LOCAL_HOSTS = new Set(['localhost', '127.0.0.1', '::1']);

export interface BridgeDependencies {
  source: CredentialSource;
  projectId: string;
  /** 外部提供的 client 由呼叫端負責關閉其連線池 */
  client?: HttpClient;
  /** 覆寫 upstream 主機（測試用） */
  baseUrl?: string;
  /** 背景更新間隔 */
  refreshIntervalMs?: number;
}

const logger = loggers.server;

/**
 * 綁定到非本機位址但沒有設定金鑰
 */
export function isExposedWithoutKey(bind: string, key: string): boolean {
  return !LOCAL_HOSTS.has(bind) && key.length === 0;
}

export class Bridge {
  readonly tokens: TokenManager;
  readonly forwarder: ProxyForwarder;
  readonly catalog: CatalogFetcher;
  readonly server: BridgeServer;
  private config: ConfigService;
  private dispatcher: Agent | null = null;

  constructor(config: ConfigService, deps: BridgeDependencies) {
    this.config = config;

    const endpoints = new VertexEndpoints({
      projectId: deps.projectId,
      location: config.get('location'),
      endpointId: config.get('endpoint_id'),
      baseUrl: deps.baseUrl,
    });
    let client = deps.client;
    if (!client) {
      this.dispatcher = createDispatcher();
      client = createHttpClient(this.dispatcher);
    }

    this.tokens = new TokenManager({
      store: config,
      source: deps.source,
      intervalMs: deps.refreshIntervalMs,
    });
    this.forwarder = new ProxyForwarder({ tokens: this.tokens, endpoints, client });
    this.catalog = new CatalogFetcher({
      tokens: this.tokens,
      endpoints,
      client,
      publishers: config.get('publishers'),
      prefixes: config.get('model_prefixes'),
      filter: config.get('filter_model_names'),
    });
    this.server = new BridgeServer({
      key: config.getKey(),
      enableModels: config.get('enable_models'),
      forwarder: this.forwarder,
      catalog: this.catalog,
    });
  }

  async start(port = this.config.getPort(), bind = this.config.getBind()): Promise<AddressInfo> {
    await this.tokens.start();
    const address = await this.server.listen(port, bind);

    logger.info('Server listening', {
      url: `http://${bind}:${address.port}`,
      models: this.config.get('enable_models'),
      autoRefresh: this.config.get('auto_refresh'),
    });
    if (isExposedWithoutKey(bind, this.config.getKey())) {
      logger.warn('Server is exposed to the network without a key, set one with --key');
    }

    return address;
  }

  async stop(): Promise<void> {
    this.tokens.stop();
    await this.server.close();

    const dispatcher = this.dispatcher;
    this.dispatcher = null;
    if (dispatcher) {
      await dispatcher.close();
      logger.debug('Upstream connection pool closed');
    }
  }
}

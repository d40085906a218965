/**
 * Token Manager
 * 管理 upstream access token 的生命週期
 * - 判斷目前 token 是否可用（到期前 10 分鐘即視為失效）
 * - 透過 Credential Source 更新並持久化
 * - 以單一互斥鎖序列化「檢查 → 更新」，並行呼叫只會觸發一次更新
 * - 背景每 5 分鐘檢查一次，讓請求路徑幾乎不必等待網路
 */

import { Mutex } from '../lib/mutex.js';
import { formatDuration, loggers, toError } from '../lib/logger.js';
import { recordTokenRefresh } from '../lib/metrics.js';
import { isBeforeWithMargin, parseInstant } from '../lib/time-utils.js';
import { CLOUD_PLATFORM_SCOPE, type CredentialSource } from './credentials.js';
import type { TokenStore } from './config.js';
import type { TokenStatus } from '../types/auth.js';

/** 安全邊界：到期前 10 分鐘即更新 */
export const TOKEN_EXPIRY_MARGIN_MS = 10 * 60 * 1000;

/** 背景檢查間隔 */
export const BACKGROUND_REFRESH_INTERVAL_MS = 5 * 60 * 1000;

export const TOKEN_SCOPES: readonly string[] = [CLOUD_PLATFORM_SCOPE];

/**
 * 提供 token 給請求路徑（ProxyForwarder / CatalogFetcher）
 */
export interface TokenProvider {
  getToken(): Promise<string | undefined>;
}

export interface TokenManagerOptions {
  store: TokenStore;
  source: CredentialSource;
  marginMs?: number;
  intervalMs?: number;
  now?: () => Date;
}

const logger = loggers.token;

export class TokenManager implements TokenProvider {
  private store: TokenStore;
  private source: CredentialSource;
  private marginMs: number;
  private intervalMs: number;
  private now: () => Date;
  private mutex = new Mutex();
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: TokenManagerOptions) {
    this.store = options.store;
    this.source = options.source;
    this.marginMs = options.marginMs ?? TOKEN_EXPIRY_MARGIN_MS;
    this.intervalMs = options.intervalMs ?? BACKGROUND_REFRESH_INTERVAL_MS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * 檢查目前的 token 是否存在且未進入安全邊界
   * 缺少欄位或無法解析的到期時間都視為失效，不拋出錯誤
   */
  isValid(): boolean {
    const { token, expiry } = this.store.getTokenState();

    if (!token || !expiry) {
      logger.debug('Token invalid: missing token or expiry');
      return false;
    }

    const expiresAt = parseInstant(expiry);
    if (!expiresAt) {
      logger.warn('Token invalid: unparsable expiry', { expiry });
      return false;
    }

    if (isBeforeWithMargin(this.now(), expiresAt, this.marginMs)) {
      logger.debug('Token valid', { expiresAt: expiresAt.toISOString() });
      return true;
    }

    logger.info('Token expired', { expiresAt: expiresAt.toISOString() });
    return false;
  }

  /**
   * 更新 token
   * force 為 false 且目前 token 仍有效時不做任何事
   * @returns 更新後是否有可用的 token；失敗時保留原狀態並回傳 false
   */
  async refresh(force = false): Promise<boolean> {
    return this.mutex.runExclusive(() => this.refreshLocked(force));
  }

  /**
   * 取得可用的 token，失效時強制更新
   * @returns 無法取得時回傳 undefined，呼叫端應立即回報錯誤
   */
  async getToken(): Promise<string | undefined> {
    return this.mutex.runExclusive(async () => {
      if (!this.isValid()) {
        logger.warn('Token expired, forcing refresh');
        if (!(await this.refreshLocked(true))) {
          logger.error('Failed to get token');
          return undefined;
        }
        // 來源可能回傳已在安全邊界內的 token
        if (!this.isValid()) {
          logger.error('Refreshed token is already near expiry');
          return undefined;
        }
      }
      return this.store.getTokenState().token;
    });
  }

  /**
   * 呼叫端必須已持有鎖
   */
  private async refreshLocked(force: boolean): Promise<boolean> {
    if (!force && this.isValid()) {
      logger.debug('No refresh needed');
      recordTokenRefresh('skipped');
      return true;
    }

    const startTime = Date.now();
    try {
      const credential = await this.source.fetchCredential([...TOKEN_SCOPES]);
      this.store.saveCredential(credential);

      const duration = Date.now() - startTime;
      recordTokenRefresh('success', duration);
      logger.info('Token refreshed', {
        duration,
        expiresAt: credential.expiresAt.toISOString(),
        expiresIn: formatDuration(credential.expiresAt.getTime() - this.now().getTime()),
      });
      return true;
    } catch (error) {
      const duration = Date.now() - startTime;
      recordTokenRefresh('failed', duration);
      logger.error('Token refresh failed', toError(error), { duration });
      return false;
    }
  }

  /**
   * auto_refresh 開啟時：立即更新一次並排程背景檢查
   * 關閉時不做任何事，token 只在請求需要時更新
   */
  async start(): Promise<void> {
    if (!this.store.getTokenState().autoRefresh) {
      logger.info('Background refresh disabled');
      return;
    }

    await this.refresh(false);
    this.startSchedule();
  }

  /**
   * 排程背景檢查；重複呼叫不會建立第二個計時器
   */
  startSchedule(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.refresh(false).catch((error: unknown) => {
        logger.error('Background refresh crashed', toError(error));
      });
    }, this.intervalMs);
    // 計時器本身不應讓 process 持續存活
    this.timer.unref();

    logger.info('Background refresh scheduled', { intervalMs: this.intervalMs });
  }

  /**
   * 停止背景檢查
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('Background refresh stopped');
    }
  }

  isScheduled(): boolean {
    return this.timer !== null;
  }

  /**
   * 狀態摘要（不含 token 本身）
   */
  getStatus(): TokenStatus {
    const { token, expiry, autoRefresh } = this.store.getTokenState();
    const expiresAt = expiry ? parseInstant(expiry) : null;

    return {
      hasToken: Boolean(token),
      expiresAt: expiresAt ? expiresAt.toISOString() : null,
      valid: Boolean(token && expiresAt && isBeforeWithMargin(this.now(), expiresAt, this.marginMs)),
      autoRefresh,
      refreshing: this.mutex.isLocked(),
      scheduled: this.isScheduled(),
    };
  }
}

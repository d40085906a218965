/**
 * Config Service
 * 設定管理服務 - 處理設定檔讀寫、預設值合併、型別驗證與環境變數
 * 同時作為 TokenManager 的持久化儲存（access_token / token_expiry / auto_refresh）
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { isDeepStrictEqual } from 'node:util';
import { loggers, isLogLevel } from '../lib/logger.js';
import { formatInstant } from '../lib/time-utils.js';
import type { BridgeConfig, ConfigKey } from '../types/config.js';
import type { Credential, TokenState } from '../types/auth.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'vertex-bridge');
const DEFAULT_CONFIG_FILE = 'config.json';

export const DEFAULT_CONFIG: Readonly<BridgeConfig> = Object.freeze({
  port: 8086,
  bind: 'localhost',
  key: '',
  access_token: null,
  token_expiry: null,
  auto_refresh: true,
  filter_model_names: true,
  enable_models: true,
  project_id: null,
  location: 'us-central1',
  endpoint_id: 'openapi',
  // 沒有 API 可以列出全部 publisher，需手動維護
  publishers: ['google', 'anthropic', 'meta'],
  model_prefixes: ['google/gemini-', 'anthropic/claude-', 'meta/llama'],
  log_level: 'info',
});

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'port',
  'bind',
  'key',
  'access_token',
  'token_expiry',
  'auto_refresh',
  'filter_model_names',
  'enable_models',
  'project_id',
  'location',
  'endpoint_id',
  'publishers',
  'model_prefixes',
  'log_level',
];

/**
 * Token 持久化介面
 */
export interface TokenStore {
  getTokenState(): TokenState;
  saveCredential(credential: Credential): void;
}

const logger = loggers.config;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 65535;
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

/**
 * 各欄位的型別檢查
 */
const VALIDATORS: { [K in ConfigKey]: (value: unknown) => value is BridgeConfig[K] } = {
  port: isPort,
  bind: (value): value is string => typeof value === 'string' && value.length > 0,
  key: (value): value is string => typeof value === 'string',
  access_token: isNullableString,
  token_expiry: isNullableString,
  auto_refresh: (value): value is boolean => typeof value === 'boolean',
  filter_model_names: (value): value is boolean => typeof value === 'boolean',
  enable_models: (value): value is boolean => typeof value === 'boolean',
  project_id: isNullableString,
  location: (value): value is string => typeof value === 'string' && /^[a-z0-9-]+$/.test(value),
  endpoint_id: (value): value is string => typeof value === 'string' && value.length > 0,
  publishers: isStringArray,
  model_prefixes: isStringArray,
  log_level: isLogLevel,
};

export function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((key) => key === value);
}

function copyDefaults(): BridgeConfig {
  return {
    ...DEFAULT_CONFIG,
    publishers: [...DEFAULT_CONFIG.publishers],
    model_prefixes: [...DEFAULT_CONFIG.model_prefixes],
  };
}

function assignValidated<K extends ConfigKey>(
  target: BridgeConfig,
  key: K,
  value: unknown
): boolean {
  const validate: (value: unknown) => value is BridgeConfig[K] = VALIDATORS[key];
  if (!validate(value)) {
    return false;
  }
  target[key] = value;
  return true;
}

/**
 * 將任意 JSON 值與預設值合併
 * 型別不符的欄位捨棄並以預設值取代；未知欄位忽略
 */
export function normalizeConfig(raw: unknown): BridgeConfig {
  const config = copyDefaults();

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    if (raw !== undefined) {
      logger.warn('Config document is not an object, using defaults');
    }
    return config;
  }

  for (const [key, value] of Object.entries(raw)) {
    if (!isConfigKey(key)) {
      logger.debug('Ignoring unknown config key', { key });
      continue;
    }
    if (!assignValidated(config, key, value)) {
      logger.warn('Invalid config value, using default', { key });
    }
  }

  return config;
}

export type ParsedConfigValue =
  | { ok: true; key: ConfigKey; value: BridgeConfig[ConfigKey] }
  | { ok: false; reason: string };

/**
 * 將 CLI 字串轉為設定值（config set）
 */
export function parseConfigValue(key: string, raw: string): ParsedConfigValue {
  if (!isConfigKey(key)) {
    return { ok: false, reason: `Unknown config key: ${key}` };
  }

  let value: unknown;
  const defaultValue = DEFAULT_CONFIG[key];

  if (typeof defaultValue === 'number') {
    value = /^\d+$/.test(raw) ? Number(raw) : raw;
  } else if (typeof defaultValue === 'boolean') {
    value = raw === 'true' ? true : raw === 'false' ? false : raw;
  } else if (Array.isArray(defaultValue)) {
    value = raw.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
  } else if (defaultValue === null) {
    value = raw === '' || raw === 'null' ? null : raw;
  } else {
    value = raw;
  }

  const target = copyDefaults();
  if (!assignValidated(target, key, value)) {
    return { ok: false, reason: `Invalid value for ${key}: ${raw}` };
  }
  return { ok: true, key, value: target[key] };
}

export class ConfigService implements TokenStore {
  private configPath: string;
  private config: BridgeConfig;

  constructor(configPath?: string) {
    this.configPath = path.resolve(
      configPath ||
        process.env.VERTEX_BRIDGE_CONFIG ||
        path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE)
    );
    this.config = this.load();
  }

  /**
   * 載入設定檔，與預設值合併；內容有變動時立即回寫
   */
  private load(): BridgeConfig {
    if (!fs.existsSync(this.configPath)) {
      logger.warn('No config file found, using defaults', { path: this.configPath });
      const config = copyDefaults();
      this.write(config);
      return config;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      logger.error(
        'Failed to load config, using defaults',
        error instanceof Error ? error : new Error(String(error)),
        { path: this.configPath }
      );
      const config = copyDefaults();
      this.write(config);
      return config;
    }

    const config = normalizeConfig(raw);
    logger.info('Config loaded', { path: this.configPath });

    if (!isDeepStrictEqual(raw, config)) {
      this.write(config);
    }
    return config;
  }

  /**
   * 同步寫入設定檔；失敗時記錄錯誤，記憶體中的設定仍然有效
   */
  private write(config: BridgeConfig): void {
    try {
      const dir = path.dirname(this.configPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      fs.writeFileSync(this.configPath, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
      logger.info('Config saved', { path: this.configPath });
    } catch (error) {
      logger.error(
        'Failed to save config',
        error instanceof Error ? error : new Error(String(error)),
        { path: this.configPath }
      );
    }
  }

  /**
   * 取得設定值
   */
  get<K extends ConfigKey>(key: K): BridgeConfig[K] {
    return this.config[key];
  }

  /**
   * 設定值（驗證後寫入）
   * @returns 值是否有變動
   */
  set<K extends ConfigKey>(key: K, value: BridgeConfig[K]): boolean {
    if (isDeepStrictEqual(this.config[key], value)) {
      return false;
    }
    if (!assignValidated(this.config, key, value)) {
      throw new TypeError(`Invalid value for config key "${key}"`);
    }
    this.write(this.config);
    return true;
  }

  /**
   * 一次套用多個設定值，只寫入一次
   * @returns 有變動的鍵
   */
  update(values: Partial<BridgeConfig>): ConfigKey[] {
    const changed: ConfigKey[] = [];
    for (const key of CONFIG_KEYS) {
      if (!(key in values)) continue;
      const value = values[key];
      if (value === undefined || isDeepStrictEqual(this.config[key], value)) continue;
      if (!assignValidated(this.config, key, value)) {
        throw new TypeError(`Invalid value for config key "${key}"`);
      }
      changed.push(key);
    }
    if (changed.length > 0) {
      this.write(this.config);
    }
    return changed;
  }

  /**
   * 回復為預設值
   */
  unset(key: ConfigKey): void {
    this.set(key, copyDefaults()[key]);
  }

  /**
   * 全部回復為預設值（包含已儲存的 token）
   */
  reset(): void {
    this.config = copyDefaults();
    this.write(this.config);
  }

  /**
   * 取得所有設定
   */
  getAll(): BridgeConfig {
    return {
      ...this.config,
      publishers: [...this.config.publishers],
      model_prefixes: [...this.config.model_prefixes],
    };
  }

  /**
   * 取得設定檔路徑
   */
  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 取得入站金鑰（優先環境變數）
   */
  getKey(): string {
    const envValue = process.env.VERTEX_BRIDGE_KEY;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config.key;
  }

  /**
   * 取得監聽埠號（優先環境變數）
   */
  getPort(): number {
    const envValue = process.env.VERTEX_BRIDGE_PORT;
    if (envValue && /^\d+$/.test(envValue) && isPort(Number(envValue))) {
      return Number(envValue);
    }
    return this.config.port;
  }

  /**
   * 取得監聽位址（優先環境變數）
   */
  getBind(): string {
    const envValue = process.env.VERTEX_BRIDGE_BIND;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config.bind;
  }

  /**
   * 取得 GCP 專案 ID（優先環境變數）；未設定時回傳 undefined，由 ADC 決定
   */
  getProjectId(): string | undefined {
    const envValue = process.env.GOOGLE_CLOUD_PROJECT;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config.project_id ?? undefined;
  }

  getTokenState(): TokenState {
    return {
      token: this.config.access_token ?? undefined,
      expiry: this.config.token_expiry ?? undefined,
      autoRefresh: this.config.auto_refresh,
    };
  }

  /**
   * token 與到期時間一起替換並寫入
   */
  saveCredential(credential: Credential): void {
    this.config.access_token = credential.token;
    this.config.token_expiry = formatInstant(credential.expiresAt);
    this.write(this.config);
  }
}

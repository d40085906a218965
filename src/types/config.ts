import type { LogLevel } from '../lib/logger.js';

/**
 * 設定檔結構（持久化為 JSON，鍵名沿用 snake_case）
 */
export interface BridgeConfig {
  /** 監聽埠號 */
  port: number;
  /** 監聽位址 */
  bind: string;
  /** 入站 Bearer 金鑰，空字串表示不驗證 */
  key: string;
  /** 目前的 Google Cloud access token */
  access_token: string | null;
  /** Token 到期時間（ISO-8601） */
  token_expiry: string | null;
  /** 是否於背景定期檢查並更新 token */
  auto_refresh: boolean;
  /** 是否只列出常用模型前綴 */
  filter_model_names: boolean;
  /** 是否提供 /models 端點 */
  enable_models: boolean;
  /** GCP 專案 ID，null 表示使用 Application Default Credentials 的預設專案 */
  project_id: string | null;
  /** Vertex AI 區域 */
  location: string;
  /** OpenAI 相容端點 ID */
  endpoint_id: string;
  /** 查詢模型清單的 publisher */
  publishers: string[];
  /** 模型 ID 前綴白名單 */
  model_prefixes: string[];
  /** 日誌最小級別 */
  log_level: LogLevel;
}

/**
 * 設定鍵值
 */
export type ConfigKey = keyof BridgeConfig;

/**
 * 由 Credential Source 取得的憑證
 */
export interface Credential {
  token: string;
  /** 絕對時間（UTC），不可為相對秒數 */
  expiresAt: Date;
}

/**
 * 持久化的 token 狀態
 */
export interface TokenState {
  token?: string;
  /** 原始字串，可能無法解析 */
  expiry?: string;
  autoRefresh: boolean;
}

/**
 * Token 狀態摘要（不含 token 本身）
 */
export interface TokenStatus {
  hasToken: boolean;
  expiresAt: string | null;
  valid: boolean;
  autoRefresh: boolean;
  refreshing: boolean;
  scheduled: boolean;
}

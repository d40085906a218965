/**
 * Bridge Errors
 * 只有 HTTP 邊界會把這些錯誤轉成狀態碼；內部子系統以 boolean / undefined 回報失敗
 */

export type BridgeErrorType =
  | 'authentication_error'
  | 'invalid_request_error'
  | 'not_found_error'
  | 'upstream_error'
  | 'server_error';

export class BridgeError extends Error {
  public readonly statusCode: number;
  public readonly type: BridgeErrorType;

  constructor(message: string, statusCode: number, type: BridgeErrorType) {
    super(message);
    this.name = 'BridgeError';
    this.statusCode = statusCode;
    this.type = type;
  }
}

/**
 * 轉發失敗：取不到 token (500) 或 upstream 無法連線 (502)
 */
export class ProxyError extends BridgeError {
  public readonly code: 'NO_TOKEN' | 'UPSTREAM_UNREACHABLE';

  constructor(message: string, code: 'NO_TOKEN' | 'UPSTREAM_UNREACHABLE', cause?: unknown) {
    super(
      message,
      code === 'NO_TOKEN' ? 500 : 502,
      code === 'NO_TOKEN' ? 'server_error' : 'upstream_error'
    );
    this.name = 'ProxyError';
    this.code = code;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * 模型清單無法產生（只在取不到 token 時發生）
 */
export class CatalogError extends BridgeError {
  public readonly code = 'NO_TOKEN';

  constructor(message: string) {
    super(message, 500, 'server_error');
    this.name = 'CatalogError';
  }
}

/**
 * Credential Source 失敗；不會穿越 TokenManager 邊界
 */
export class CredentialError extends Error {
  public readonly code = 'CREDENTIAL_UNAVAILABLE';

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'CredentialError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

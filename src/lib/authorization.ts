/**
 * Authorization Header
 * `Authorization: Bearer <token>`，scheme 不分大小寫，必須恰好兩段
 */

export type AuthCheckResult =
  | { ok: true }
  | { ok: false; reason: string };

/**
 * 取出 Bearer token；格式不符時回傳 null
 */
export function parseBearer(header: string | undefined): string | null {
  if (!header) {
    return null;
  }

  const parts = header.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return null;
  }

  return parts[1];
}

/**
 * 組出 Authorization 標頭值
 */
export function formatBearer(token: string): string {
  return `Bearer ${token}`;
}

/**
 * 驗證入站請求的 Authorization
 * key 為空字串時不驗證
 */
export function checkAuthorization(header: string | undefined, key: string): AuthCheckResult {
  if (!key) {
    return { ok: true };
  }

  if (!header) {
    return { ok: false, reason: 'Missing Authorization header' };
  }

  const token = parseBearer(header);
  if (token === null) {
    return { ok: false, reason: 'Invalid Authorization header format' };
  }

  if (token !== key) {
    return { ok: false, reason: 'Invalid token' };
  }

  return { ok: true };
}

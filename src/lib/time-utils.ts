/**
 * Time Utilities
 * 到期時間的解析與比較，一律以 UTC 絕對時間處理
 */

/** 結尾帶有時區標記：Z、+08:00、-0500 */
const ZONE_DESIGNATOR = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/** 僅有日期時間部分的 ISO-8601 字串 */
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?/;

/**
 * 解析 ISO-8601 時間字串
 * 沒有時區標記時視為 UTC；無法解析時回傳 null
 */
export function parseInstant(value: string): Date | null {
  const trimmed = value.trim();
  if (!ISO_DATE_TIME.test(trimmed)) {
    return null;
  }

  const normalized = ZONE_DESIGNATOR.test(trimmed)
    ? trimmed
    : `${trimmed.replace(' ', 'T')}Z`;

  const ms = Date.parse(normalized);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * 轉為持久化格式（毫秒精度，Z 結尾）
 */
export function formatInstant(date: Date): string {
  return date.toISOString();
}

/**
 * 判斷距到期是否仍大於安全邊界
 */
export function isBeforeWithMargin(now: Date, expiresAt: Date, marginMs: number): boolean {
  return now.getTime() < expiresAt.getTime() - marginMs;
}

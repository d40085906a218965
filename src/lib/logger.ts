/**
 * Structured Logger - 結構化日誌系統
 * 特性：
 *   - JSON 格式輸出（每行一筆，易於機器解析）
 *   - 日誌級別控制
 *   - requestId 追蹤
 *   - 性能監控 (duration)
 *   - 錯誤堆棧記錄
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  /** 請求唯一識別碼，用於追蹤一個請求的完整生命週期 */
  requestId?: string;
  /** 操作類型 (GET, POST, 等) */
  method?: string;
  /** 請求 URL 或端點 */
  url?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  /** 返回狀態碼 */
  statusCode?: number;
  /** 自定義數據 */
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: 'info') */
  minLevel?: LogLevel;
}

/** 日誌級別優先級 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
    return String(error.code);
  }
  return undefined;
}

/**
 * 結構化日誌記錄器
 * 所有日誌都以 JSON 格式輸出，便於中央日誌系統解析
 */
export class StructuredLogger {
  private component: string;
  private minLevel: LogLevel;

  constructor(
    component: string,
    config: LoggerConfig = {}
  ) {
    this.component = component;
    this.minLevel = config.minLevel || 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  /**
   * 輸出日誌
   */
  private output(entry: LogEntry): void {
    const formatted = JSON.stringify(entry);

    // 根據日誌級別選擇輸出方法
    switch (entry.level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
      default:
        console.log(formatted);
    }
  }

  debug(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;

    this.log('debug', message, context, metadata);
  }

  info(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;

    this.log('info', message, context, metadata);
  }

  warn(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;

    this.log('warn', message, context, metadata);
  }

  error(
    message: string,
    error?: Error | null,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    if (!this.shouldLog('error')) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message,
      component: this.component,
      context,
      metadata
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: error.stack
      };
    }

    this.output(entry);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context,
      metadata
    };

    this.output(entry);
  }

  /**
   * 設定日誌最小級別
   */
  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * 執行帶日誌的非同步操作
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await fn();
      const duration = Date.now() - startTime;

      this.info(`${operation} completed`, {
        ...context,
        duration
      });

      return result;
    } catch (error) {
      const duration = Date.now() - startTime;

      this.error(
        `${operation} failed`,
        toError(error),
        {
          ...context,
          duration
        }
      );

      throw error;
    }
  }
}

/**
 * 將未知錯誤轉為 Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * 預設的日誌記錄器實例
 * 按組件分類，便於按服務過濾日誌
 */
export const loggers = {
  config: new StructuredLogger('Config'),
  token: new StructuredLogger('Token'),
  credentials: new StructuredLogger('Credentials'),
  proxy: new StructuredLogger('Proxy'),
  catalog: new StructuredLogger('Models'),
  server: new StructuredLogger('Server'),
  retry: new StructuredLogger('Retry', { minLevel: 'debug' })
};

/**
 * 一次設定所有組件的日誌級別
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}

/**
 * 建立追蹤上下文（用於 HTTP 請求）
 */
export function createRequestContext(method?: string, url?: string): LogContext {
  return {
    requestId: randomUUID(),
    method,
    url
  };
}

/**
 * 時間格式化輔助函數
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  }
  if (ms < 60 * 1000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m${seconds}s`;
}

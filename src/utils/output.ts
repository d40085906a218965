/**
 * Output Formatter
 * CLI 輸出格式化 - 支援 JSON 與 Table 格式
 */

import Table from 'cli-table3';
import type { Command } from 'commander';

/**
 * 輸出格式類型
 */
export type OutputFormat = 'json' | 'table';

export interface GlobalOptions {
  format: OutputFormat;
  verbose: boolean;
  /** 設定檔路徑（未指定時由 ConfigService 決定） */
  config?: string;
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'table';
}

/**
 * 取得全域選項（-f / -c）
 */
export function getGlobalOptions(cmd: Command): GlobalOptions {
  const opts: Record<string, unknown> = cmd.optsWithGlobals();
  return {
    format: isOutputFormat(opts.format) ? opts.format : 'json',
    verbose: opts.verbose === true,
    config: typeof opts.config === 'string' ? opts.config : undefined,
  };
}

/**
 * 格式化單一值（表格用）
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '-';
  }
  if (Array.isArray(value)) {
    return value.map((item) => String(item)).join(', ');
  }
  return String(value);
}

/**
 * 格式化 JSON
 */
export function formatJSON<T>(
  data: T,
  pretty: boolean = true
): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * 格式化為兩欄表格（key / value）
 */
export function formatKeyValueTable(
  data: object,
  head: [string, string] = ['Key', 'Value']
): string {
  const table = new Table({
    head,
    style: { head: ['cyan'] },
    wordWrap: true,
  });

  for (const [key, value] of Object.entries(data)) {
    table.push([key, formatValue(value)]);
  }

  return table.toString();
}

/**
 * 通用輸出函數
 */
export function output(
  data: object,
  format: OutputFormat = 'json'
): string {
  switch (format) {
    case 'table':
      return formatKeyValueTable(data);
    case 'json':
    default:
      return formatJSON(data);
  }
}

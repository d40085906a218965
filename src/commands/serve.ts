/**
 * Serve Command
 * 啟動 bridge 伺服器（預設指令）
 *
 * 旗標會寫回設定檔，下次啟動不必重複指定：
 *   -p 不帶值 → 預設埠號；-b 不帶值 → localhost；-k 不帶值 → 清除金鑰
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { CredentialError } from '../lib/errors.js';
import { LOG_LEVELS, isLogLevel, loggers, setLogLevel, toError } from '../lib/logger.js';
import { Bridge } from '../services/bridge.js';
import { ConfigService, DEFAULT_CONFIG } from '../services/config.js';
import { GoogleCredentialSource } from '../services/credentials.js';
import { getGlobalOptions } from '../utils/output.js';
import type { BridgeConfig } from '../types/config.js';

const logger = loggers.server;

/**
 * 解析埠號參數
 */
export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

/**
 * 將指令列旗標轉為要寫回的設定值；未指定的旗標不出現在結果中
 */
export function resolveServeFlags(opts: Record<string, unknown>): Partial<BridgeConfig> {
  const values: Partial<BridgeConfig> = {};

  if (opts.port === true) {
    values.port = DEFAULT_CONFIG.port;
  } else if (typeof opts.port === 'number') {
    values.port = opts.port;
  }

  if (opts.bind === true) {
    values.bind = DEFAULT_CONFIG.bind;
  } else if (typeof opts.bind === 'string') {
    values.bind = opts.bind;
  }

  if (opts.key === true) {
    values.key = '';
  } else if (typeof opts.key === 'string') {
    values.key = opts.key;
  }

  if (typeof opts.autoRefresh === 'boolean') {
    values.auto_refresh = opts.autoRefresh;
  }
  if (typeof opts.filterModelNames === 'boolean') {
    values.filter_model_names = opts.filterModelNames;
  }
  if (typeof opts.models === 'boolean') {
    values.enable_models = opts.models;
  }
  if (isLogLevel(opts.logLevel)) {
    values.log_level = opts.logLevel;
  }

  return values;
}

function installShutdown(bridge: Bridge): void {
  let stopping = false;

  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info('Shutting down', { signal });

    bridge.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', toError(error));
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

export function createServeCommand(): Command {
  const command = new Command('serve')
    .description('Start the bridge server (default command)')
    .option('-p, --port [port]', `Port to listen on (default: ${DEFAULT_CONFIG.port})`, parsePort)
    .option('-b, --bind [host]', `Host to bind to (default: ${DEFAULT_CONFIG.bind})`)
    .option('-k, --key [key]', 'API key clients must send as a bearer token; empty disables auth')
    .option('--auto-refresh', 'Refresh the token in the background every 5 minutes (default)')
    .option('--no-auto-refresh', 'Only refresh the token on demand')
    .option('--filter-model-names', 'Only list models matching the configured prefixes (default)')
    .option('--no-filter-model-names', 'List every model the publishers return')
    .option('--models', 'Serve the /models endpoint (default)')
    .option('--no-models', 'Disable the /models endpoint')
    .addOption(new Option('--log-level <level>', 'Log level').choices(LOG_LEVELS))
    .action(async (_options: unknown, cmd: Command) => {
      const config = new ConfigService(getGlobalOptions(cmd).config);
      const changed = config.update(resolveServeFlags(cmd.opts()));
      setLogLevel(config.get('log_level'));
      if (changed.length > 0) {
        logger.info('Config updated from flags', { keys: changed });
      }

      const source = new GoogleCredentialSource();
      let projectId: string;
      try {
        projectId = config.getProjectId() ?? (await source.getProjectId());
      } catch (error) {
        if (error instanceof CredentialError) {
          logger.error('Failed to resolve project ID', error);
          process.exitCode = 2;
          return;
        }
        throw error;
      }

      const bridge = new Bridge(config, { source, projectId });
      await bridge.start();
      installShutdown(bridge);
    });

  return command;
}

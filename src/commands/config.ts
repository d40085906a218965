/**
 * Config Command
 * 設定管理指令
 */

import { Command } from 'commander';
import { ConfigService, isConfigKey, parseConfigValue } from '../services/config.js';
import { getGlobalOptions, output } from '../utils/output.js';
import type { BridgeConfig } from '../types/config.js';

/**
 * 遮蔽機密欄位，只保留前 4 個字元
 */
export function maskSecret(value: string | null): string | null {
  if (!value) {
    return value;
  }
  return value.length <= 4 ? '****' : `${value.slice(0, 4)}****`;
}

export function redactConfig(config: BridgeConfig): BridgeConfig {
  return {
    ...config,
    key: maskSecret(config.key) ?? '',
    access_token: maskSecret(config.access_token),
  };
}

export function createConfigCommand(): Command {
  const command = new Command('config')
    .description('Manage the persisted configuration');

  /**
   * vertex-bridge config show
   */
  command
    .command('show')
    .description('Show the current configuration (secrets masked)')
    .option('--reveal', 'Show secrets unmasked')
    .action((options: { reveal?: boolean }, cmd: Command) => {
      const { format, config: configPath } = getGlobalOptions(cmd);
      const config = new ConfigService(configPath);
      const values = options.reveal ? config.getAll() : redactConfig(config.getAll());
      console.log(output(values, format));
    });

  /**
   * vertex-bridge config path
   */
  command
    .command('path')
    .description('Print the configuration file path')
    .action((_options: unknown, cmd: Command) => {
      const config = new ConfigService(getGlobalOptions(cmd).config);
      console.log(config.getConfigPath());
    });

  /**
   * vertex-bridge config set <key> <value>
   */
  command
    .command('set <key> <value>')
    .description('Set a configuration value (lists are comma separated, "null" clears)')
    .action((key: string, value: string, _options: unknown, cmd: Command) => {
      const parsed = parseConfigValue(key, value);
      if (!parsed.ok) {
        console.error(`Error: ${parsed.reason}`);
        process.exitCode = 1;
        return;
      }

      const config = new ConfigService(getGlobalOptions(cmd).config);
      const changed = config.set(parsed.key, parsed.value);
      console.log(changed ? `Set ${parsed.key}` : `${parsed.key} unchanged`);
    });

  /**
   * vertex-bridge config reset [key]
   */
  command
    .command('reset [key]')
    .description('Reset one key, or the whole configuration, to defaults')
    .action((key: string | undefined, _options: unknown, cmd: Command) => {
      if (key !== undefined && !isConfigKey(key)) {
        console.error(`Error: Unknown config key: ${key}`);
        process.exitCode = 1;
        return;
      }

      const config = new ConfigService(getGlobalOptions(cmd).config);
      if (key === undefined) {
        config.reset();
        console.log('Configuration reset to defaults');
        return;
      }

      config.unset(key);
      console.log(`Reset ${key}`);
    });

  return command;
}

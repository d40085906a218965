/**
 * Token Command
 * 檢視與手動更新 upstream access token
 */

import { Command } from 'commander';
import { ConfigService } from '../services/config.js';
import { GoogleCredentialSource } from '../services/credentials.js';
import { TokenManager } from '../services/token-manager.js';
import { getGlobalOptions, output } from '../utils/output.js';

function createManager(configPath: string | undefined): TokenManager {
  return new TokenManager({
    store: new ConfigService(configPath),
    source: new GoogleCredentialSource(),
  });
}

export function createTokenCommand(): Command {
  const command = new Command('token')
    .description('Inspect or refresh the upstream access token');

  /**
   * vertex-bridge token status
   */
  command
    .command('status')
    .description('Show whether the stored token is present and valid')
    .action((_options: unknown, cmd: Command) => {
      const { format, config } = getGlobalOptions(cmd);
      const status = createManager(config).getStatus();
      console.log(output(status, format));
    });

  /**
   * vertex-bridge token refresh
   */
  command
    .command('refresh')
    .description('Fetch a new token if the stored one is near expiry')
    .option('--force', 'Refresh even if the stored token is still valid')
    .action(async (options: { force?: boolean }, cmd: Command) => {
      const { format, config } = getGlobalOptions(cmd);
      const manager = createManager(config);

      const ok = await manager.refresh(options.force === true);
      if (!ok) {
        console.error('Error: Token refresh failed, check your Application Default Credentials');
        process.exitCode = 2;
        return;
      }

      console.log(output(manager.getStatus(), format));
    });

  return command;
}

import { Command } from 'commander';
import { createServeCommand } from './commands/serve.js';
import { createTokenCommand } from './commands/token.js';
import { createConfigCommand } from './commands/config.js';
import { setLogLevel } from './lib/logger.js';
import { VERSION } from './lib/version.js';
import { getGlobalOptions } from './utils/output.js';

export function createCli(): Command {
  const cli = new Command();

  cli
    .name('vertex-bridge')
    .description('Credentialed OpenAI-compatible proxy in front of the Vertex AI API')
    .version(VERSION);

  // 全域選項
  cli
    .option('-c, --config <path>', '設定檔路徑 (default: ~/.config/vertex-bridge/config.json)')
    .option('-f, --format <format>', '輸出格式: json (default) | table', 'json')
    .option('-v, --verbose', '詳細模式');

  // serve 依設定檔決定日誌級別；其他指令只輸出警告以上，避免干擾 stdout
  cli.hook('preAction', (_root, action) => {
    if (action.name() !== 'serve') {
      setLogLevel(getGlobalOptions(action).verbose ? 'debug' : 'warn');
    }
  });

  // 註冊指令
  cli.addCommand(createServeCommand(), { isDefault: true });
  cli.addCommand(createTokenCommand());
  cli.addCommand(createConfigCommand());

  return cli;
}

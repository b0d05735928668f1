import { Command } from 'commander';
import chalk from 'chalk';
import { ENV_VARS, describeOptions, loadProxyOptions } from '../../config/options.js';
import { logger } from '../../utils/logger.js';

export function createConfigCommand(): Command {
  const command = new Command('config');

  command
    .description('Show the configuration the proxy would start with')
    .option('--json', 'Print as JSON')
    .action((flags: { json?: boolean }) => {
      const resolved = describeOptions(loadProxyOptions());

      if (flags.json) {
        console.log(JSON.stringify(resolved, null, 2));
        return;
      }

      console.log(chalk.bold('\nResolved configuration:\n'));
      for (const [key, value] of Object.entries(resolved)) {
        console.log(`  ${chalk.cyan(key.padEnd(24))} ${String(value)}`);
      }

      console.log(chalk.bold('\nEnvironment variables:\n'));
      for (const variable of Object.values(ENV_VARS)) {
        console.log(`  ${variable}`);
      }

      const logFile = logger.getLogFilePath();
      if (logFile) {
        console.log(chalk.white(`\nLog file: ${logFile}\n`));
      }
    });

  return command;
}

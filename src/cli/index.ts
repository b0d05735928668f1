#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { createStartCommand } from './commands/start.js';
import { createConfigCommand } from './commands/config.js';
import { getErrorMessage } from '../utils/errors.js';

const program = new Command();

function readVersion(): string {
  try {
    const packageJsonPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
      return packageJson.version;
    }
  } catch {
    // Unbundled layouts without package.json fall through to the default
  }
  return '0.0.0';
}

program
  .name('authbridge')
  .description('Intercepting proxy that adapts OAuth-style client-credential calls for the Checkpoint and Microsoft Graph APIs')
  .version(readVersion());

program.addCommand(createStartCommand());
program.addCommand(createConfigCommand());

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(getErrorMessage(error)));
  process.exit(1);
});

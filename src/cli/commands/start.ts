import { Command } from 'commander';
import chalk from 'chalk';
import { applyOverrides, describeOptions, loadProxyOptions } from '../../config/options.js';
import { AuthBridgeProxy } from '../../proxy/server.js';
import { logger } from '../../utils/logger.js';

interface StartCommandOptions {
  host?: string;
  port?: string;
  timeout?: string;
  verbose?: boolean;
  autoFetch: boolean;
}

export function createStartCommand(): Command {
  const command = new Command('start');

  command
    .description('Start the proxy and rewrite Checkpoint and Microsoft Graph traffic passing through it')
    .option('--host <address>', 'Listen address (overrides AUTHBRIDGE_LISTEN_ADDRESS)')
    .option('-p, --port <port>', 'Listen port, 0 picks a free one (overrides AUTHBRIDGE_LISTEN_PORT)')
    .option('-t, --timeout <seconds>', 'Upstream timeout in seconds, clamped to 5-240')
    .option('-v, --verbose', 'Print debug output')
    .option('--no-auto-fetch', 'Never fetch logs after a Checkpoint login')
    .action(async (flags: StartCommandOptions) => {
      try {
        const options = applyOverrides(loadProxyOptions(), {
          listenAddress: flags.host,
          listenPort: flags.port,
          timeoutSeconds: flags.timeout,
          verbose: flags.verbose,
          autoFetchLogs: flags.autoFetch ? undefined : false
        });
        logger.setVerbose(options.verbose);
        logger.info('authbridge_starting', describeOptions(options));

        const proxy = new AuthBridgeProxy(options);
        const address = await proxy.start();
        logger.info('authbridge_listening', { url: address.url });
        logger.success(`Proxy listening on ${chalk.bold(address.url)}`);

        const shutdown = (signal: NodeJS.Signals): void => {
          proxy.stop()
            .then(() => {
              logger.info('authbridge_stopped', { signal });
              logger.close();
              process.exit(0);
            })
            .catch((error: unknown) => {
              logger.error('authbridge_stop_failed', error);
              logger.close();
              process.exit(1);
            });
        };

        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
      } catch (error: unknown) {
        logger.error('authbridge_start_failed', error);
        logger.close();
        process.exit(1);
      }
    });

  return command;
}

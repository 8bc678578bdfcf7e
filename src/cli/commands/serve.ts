import { Command } from 'commander';
import { ConfigValidationError } from '../../config/validator';
import { MeasurementManager } from '../../orchestrator/manager';
import { createControlServer } from '../../server/control-server';
import { ConsoleLogger } from '../../utils/logger';
import { formatError, formatStep } from '../formatters';
import { addCommonOptions, configFromOptions } from '../options';
import type { CommonOptions } from '../options';

type ServeCommandOptions = CommonOptions & {
  host?: string;
  port?: string;
};

async function handleServe(options: ServeCommandOptions): Promise<void> {
  const config = configFromOptions(options, {
    server: {
      host: options.host,
      port: options.port === undefined ? undefined : Number(options.port),
    },
  });
  const logger = new ConsoleLogger(undefined, config.logging.level);
  const manager = new MeasurementManager({
    logger,
    retentionMs: config.manager.retentionMs,
    subscriberBufferSize: config.manager.subscriberBufferSize,
  });

  const app = await createControlServer(manager, config, logger);
  const address = await app.listen({ host: config.server.host, port: config.server.port });
  console.log(formatStep(`Control plane listening on ${address}`));

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`);
    manager
      .shutdown()
      .then(() => app.close())
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        process.exitCode = 1;
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

export function registerServeCommand(program: Command): void {
  addCommonOptions(program.command('serve'))
    .description('Expose start/pause/resume/cancel/status and a progress WebSocket over HTTP')
    .option('--host <host>', 'Interface to bind')
    .option('-p, --port <port>', 'Port to listen on')
    .action(async (options: ServeCommandOptions) => {
      try {
        await handleServe(options);
      } catch (err) {
        const msg = err instanceof ConfigValidationError ? err.message : `Server failed to start: ${err instanceof Error ? err.message : String(err)}`;
        console.error(formatError(msg));
        process.exitCode = 1;
      }
    });
}

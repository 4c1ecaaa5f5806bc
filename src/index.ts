#!/usr/bin/env node
import path from 'path';
import { Command } from 'commander';
import { createManifestServer } from './adapters/http/ManifestServer';
import { createLogger, createUpdateServices } from './bootstrap';
import { loadEnvConfig } from './config';
import { exitCodeFor } from './core/errors';
import { ChannelName } from './core/entities/UpdateChannel';
import { parseChannel, parsePort } from './cli/options';

type ServeOptions = {
  port: number;
  host: string;
  directory: string;
  channel: ChannelName;
  path?: string;
};

async function main() {
  const config = loadEnvConfig();
  const logger = createLogger(config);

  const program = new Command()
    .name('mar-update-server')
    .description('Serve an update manifest for the newest .mar package in a directory')
    .option('-p, --port <port>', 'port to serve on', parsePort, config.server.port)
    .option('--host <host>', 'interface to bind', config.server.host)
    .option('-d, --directory <dir>', 'directory of update files', config.updates.directory)
    .option('-c, --channel <name>', 'update channel (default or stable)', parseChannel, config.updates.channel)
    .option('--path <segment>', 'path segment of the download URL', config.updates.path);
  program.parse(process.argv);
  const options = program.opts<ServeOptions>();

  try {
    logger.info('Starting update server...');
    logger.info(`Environment: ${config.nodeEnv}`);

    const directory = path.resolve(options.directory);
    const { serveManifest } = await createUpdateServices({
      directory,
      channel: options.channel,
      path: options.path,
      downloadBaseUrl: config.updates.downloadBaseUrl,
      logger,
    });

    const app = createManifestServer({ manifests: serveManifest, logger });
    await app.listen({ port: options.port, host: options.host });
    console.log(`http://localhost:${options.port}/`);

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down gracefully...`);
      app
        .close()
        .then(() => logger.close())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error during shutdown:', error);
          process.exit(1);
        });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logger.error('Error starting update server:', error);
    process.exit(exitCodeFor(error));
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(exitCodeFor(error));
});

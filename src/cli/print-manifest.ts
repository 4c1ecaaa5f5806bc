#!/usr/bin/env node

import path from 'path';
import { Command } from 'commander';
import { createLogger, createUpdateServices } from '../bootstrap';
import { loadEnvConfig } from '../config';
import { exitCodeFor } from '../core/errors';
import { ChannelName } from '../core/entities/UpdateChannel';
import { parseChannel } from './options';

type PrintOptions = {
  directory: string;
  channel: ChannelName;
  path?: string;
  dogfoodId?: string;
};

async function printManifest() {
  const config = loadEnvConfig();
  // Keep stdout clean for the manifest itself
  const logger = createLogger({ ...config, logging: { ...config.logging, level: 'error' } });

  const program = new Command()
    .name('print-manifest')
    .description('Print the update manifest for the newest package in a directory')
    .option('-d, --directory <dir>', 'directory of update files', config.updates.directory)
    .option('-c, --channel <name>', 'update channel (default or stable)', parseChannel, config.updates.channel)
    .option('--path <segment>', 'path segment of the download URL', config.updates.path)
    .option('--dogfood-id <id>', 'dogfooding prerelease id to append to the URL');
  program.parse(process.argv);
  const options = program.opts<PrintOptions>();

  const { serveManifest } = await createUpdateServices({
    directory: path.resolve(options.directory),
    channel: options.channel,
    path: options.path,
    downloadBaseUrl: config.updates.downloadBaseUrl,
    logger,
  });
  const manifest = await serveManifest.execute({ dogfoodId: options.dogfoodId });
  if (manifest === null) {
    throw new Error('No current update');
  }
  process.stdout.write(manifest + '\n');
}

printManifest().catch((err: unknown) => {
  console.error('Failed to print manifest:', err);
  process.exit(exitCodeFor(err));
});

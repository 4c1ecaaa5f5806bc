import { CryptoHashService } from './adapters/hash/CryptoHashService';
import { ConsoleLogger } from './adapters/logging/ConsoleLogger';
import { ServeManifestUseCase } from './application/ServeManifestUseCase';
import { Config } from './config/validation';
import { CHANNELS, ChannelName } from './core/entities/UpdateChannel';
import { Logger } from './core/services/Logger';
import { ManifestRenderer } from './core/services/ManifestRenderer';
import { IniMetadataReader } from './core/services/MetadataReader';
import { UpdateRegistry } from './core/services/UpdateRegistry';

export interface UpdateServiceOptions {
  directory: string;
  channel: ChannelName;
  path?: string;
  downloadBaseUrl: string;
  logger: Logger;
}

export interface UpdateServices {
  registry: UpdateRegistry;
  serveManifest: ServeManifestUseCase;
}

export function createLogger(config: Config): ConsoleLogger {
  return new ConsoleLogger(config.logging.level, config.logging.filePath, {
    rotate: config.logging.rotate,
    maxSizeBytes: config.logging.maxSizeMB * 1024 * 1024,
    maxFiles: config.logging.maxFiles,
  });
}

/** Wires the adapters into the registry and runs its first scan. */
export async function createUpdateServices(options: UpdateServiceOptions): Promise<UpdateServices> {
  const { logger } = options;
  const registry = new UpdateRegistry({
    directory: options.directory,
    channel: CHANNELS[options.channel],
    hashService: new CryptoHashService('sha512'),
    metadataReader: new IniMetadataReader(),
    logger,
  });
  await registry.initialize();

  const serveManifest = new ServeManifestUseCase(
    registry,
    new ManifestRenderer(options.downloadBaseUrl),
    logger,
    options.path
  );
  return { registry, serveManifest };
}

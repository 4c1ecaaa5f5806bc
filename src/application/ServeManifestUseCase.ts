import path from 'path';
import { UpdateRegistry } from '../core/services/UpdateRegistry';
import { ManifestRenderer } from '../core/services/ManifestRenderer';
import { Logger } from '../core/services/Logger';

export interface ManifestRequest {
  dogfoodId?: string;
}

/** Last component of the watched directory, e.g. `/srv/updates/nightly/` -> `nightly`. */
export function defaultManifestPath(directory: string): string {
  return path.basename(path.resolve(directory));
}

export class ServeManifestUseCase {
  private readonly manifestPath: string;

  constructor(
    private registry: UpdateRegistry,
    private renderer: ManifestRenderer,
    private logger: Logger,
    manifestPath?: string
  ) {
    this.manifestPath = manifestPath ?? defaultManifestPath(registry.directory);
  }

  /**
   * Rescans the directory and renders the manifest of the newest update.
   * Resolves to null when no update is known. A failed rescan is logged and
   * the last successfully scanned state is served.
   */
  async execute(request: ManifestRequest = {}): Promise<string | null> {
    try {
      await this.registry.scan();
    } catch (error) {
      this.logger.warn(`Rescan of ${this.registry.directory} failed, serving last known state:`, error);
    }

    const update = this.registry.current;
    if (!update) {
      this.logger.debug('No current update to serve');
      return null;
    }

    const [hash, metadata] = await Promise.all([update.hash(), update.metadata()]);
    this.logger.debug(`Serving ${update.filename} (build ${metadata.buildId}, version ${metadata.version})`);

    return this.renderer.render(
      { filename: update.filename, size: update.size, hash, metadata },
      { path: this.manifestPath, dogfoodId: request.dogfoodId || undefined }
    );
  }
}

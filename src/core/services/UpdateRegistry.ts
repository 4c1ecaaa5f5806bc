import { readdir, stat } from 'fs/promises';
import path from 'path';
import { UpdateFile } from '../entities/UpdateFile';
import { UpdateChannel, matchesChannel } from '../entities/UpdateChannel';
import { NoUpdatesError, ScanError } from '../errors';
import { HashService } from './HashService';
import { Logger } from './Logger';
import { MetadataReader } from './MetadataReader';

export interface UpdateRegistryOptions {
  directory: string;
  channel: UpdateChannel;
  hashService: HashService;
  metadataReader: MetadataReader;
  logger: Logger;
}

interface ObservedFile {
  filename: string;
  modifiedTimeMs: number;
  size: number;
}

let hashRuns = 0;

/**
 * Tracks the update packages of one channel in one directory.
 *
 * Entries are never evicted: a package deleted from disk keeps its cache
 * entry, and may stay current, until the process restarts.
 */
export class UpdateRegistry {
  private readonly cache = new Map<string, UpdateFile>();
  private currentUpdate: UpdateFile | null = null;
  private lock: Promise<void> = Promise.resolve();

  constructor(private readonly options: UpdateRegistryOptions) {}

  get directory(): string {
    return this.options.directory;
  }

  get channel(): UpdateChannel {
    return this.options.channel;
  }

  get current(): UpdateFile | null {
    return this.currentUpdate;
  }

  get size(): number {
    return this.cache.size;
  }

  entries(): UpdateFile[] {
    return Array.from(this.cache.values());
  }

  /** First scan; an empty result is a configuration error. */
  async initialize(): Promise<void> {
    await this.scan();
    if (this.cache.size === 0) {
      throw new NoUpdatesError(`No updates found in ${this.directory}`, {
        details: { channel: this.channel.name, prefix: this.channel.prefix },
      });
    }
    this.options.logger.info(
      `Tracking ${this.cache.size} ${this.channel.name} update(s) in ${this.directory}; current: ${this.currentUpdate?.filename}`
    );
  }

  /** Scans run one at a time, in call order. */
  scan(): Promise<void> {
    const run = this.lock.then(() => this.performScan());
    this.lock = run.catch(() => undefined);
    return run;
  }

  private async performScan(): Promise<void> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      throw new ScanError(`Cannot list update directory ${this.directory}`, { cause: error });
    }

    const candidates = names.filter((name) => matchesChannel(this.channel, name));
    const observed = await Promise.all(candidates.map((name) => this.observe(name)));

    // No awaits below: cache and current change together.
    for (const file of observed) {
      if (!file) continue;
      const existing = this.cache.get(file.filename);
      if (existing && existing.sameStatAs(file.modifiedTimeMs, file.size)) continue;
      if (existing) {
        this.options.logger.debug(`Update ${file.filename} changed on disk, dropping cached hash`);
      }
      this.cache.set(file.filename, this.createUpdateFile(file));
    }

    const previous = this.currentUpdate;
    this.currentUpdate = this.selectCurrent();
    if (this.currentUpdate && this.currentUpdate !== previous) {
      this.options.logger.info(`Current update is now ${this.currentUpdate.filename}`);
    }
  }

  private async observe(filename: string): Promise<ObservedFile | null> {
    try {
      const stats = await stat(path.join(this.directory, filename));
      if (!stats.isFile()) return null;
      return { filename, modifiedTimeMs: stats.mtimeMs, size: stats.size };
    } catch (error) {
      if (isNotFound(error)) {
        this.options.logger.debug(`Update ${filename} vanished during scan`);
        return null;
      }
      throw new ScanError(`Cannot stat update ${filename}`, { cause: error });
    }
  }

  private createUpdateFile(file: ObservedFile): UpdateFile {
    const { hashService, metadataReader, logger } = this.options;
    return new UpdateFile(this.directory, file.filename, this.channel, file.modifiedTimeMs, file.size, {
      hash: async (filePath) => {
        // Unique per run: a replaced entry may still be hashing the same filename
        const label = `hash-${file.filename}#${++hashRuns}`;
        logger.time(label);
        try {
          return await hashService.computeFileHash(filePath);
        } finally {
          logger.timeEnd(label);
        }
      },
      metadata: (metadataPath) => metadataReader.read(metadataPath),
    });
  }

  private selectCurrent(): UpdateFile | null {
    let best: UpdateFile | null = null;
    for (const file of this.cache.values()) {
      if (!best || file.isNewerThan(best)) best = file;
    }
    return best;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

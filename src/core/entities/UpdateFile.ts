import path from 'path';
import { Lazy } from '../utils/Lazy';
import { MetadataRecord } from './MetadataRecord';
import { UpdateChannel, companionMetadataName, versionStampOf } from './UpdateChannel';

export interface UpdateFileLoaders {
  hash: (filePath: string) => Promise<string>;
  metadata: (metadataPath: string) => Promise<MetadataRecord>;
}

/**
 * A `.mar` package seen in the watched directory.
 *
 * Stat data is captured at construction. The content hash and the companion
 * metadata are loaded on first use and kept for the lifetime of the object:
 * if the file is rewritten in place with the same mtime and size, `hash()`
 * keeps returning the old digest.
 */
export class UpdateFile {
  public readonly path: string;
  public readonly versionStamp: string;
  private readonly hashValue: Lazy<string>;
  private readonly metadataValue: Lazy<MetadataRecord>;

  constructor(
    public readonly directory: string,
    public readonly filename: string,
    public readonly channel: UpdateChannel,
    /** Sub-millisecond precision, as reported by `stat().mtimeMs`. */
    public readonly modifiedTimeMs: number,
    public readonly size: number,
    loaders: UpdateFileLoaders
  ) {
    this.path = path.join(directory, filename);
    this.versionStamp = versionStampOf(channel, filename);
    this.hashValue = new Lazy(() => loaders.hash(this.path));
    this.metadataValue = new Lazy(() => loaders.metadata(this.metadataPath));
  }

  get modifiedTime(): Date {
    return new Date(this.modifiedTimeMs);
  }

  get metadataPath(): string {
    return path.join(this.directory, companionMetadataName(this.versionStamp));
  }

  hash(): Promise<string> {
    return this.hashValue.get();
  }

  metadata(): Promise<MetadataRecord> {
    return this.metadataValue.get();
  }

  isHashResolved(): boolean {
    return this.hashValue.status === 'resolved';
  }

  sameStatAs(modifiedTimeMs: number, size: number): boolean {
    return this.modifiedTimeMs === modifiedTimeMs && this.size === size;
  }

  /** Newer mtime wins; equal mtimes fall back to the greater filename. */
  isNewerThan(other: UpdateFile): boolean {
    const delta = this.modifiedTimeMs - other.modifiedTimeMs;
    if (delta !== 0) return delta > 0;
    return this.filename > other.filename;
  }
}

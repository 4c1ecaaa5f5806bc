import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { CHANNELS, UpdateChannel } from '../../entities/UpdateChannel';
import { NoUpdatesError, ScanError } from '../../errors';
import { HashService } from '../HashService';
import { Logger } from '../Logger';
import { IniMetadataReader } from '../MetadataReader';
import { UpdateRegistry } from '../UpdateRegistry';

const mockLogger: jest.Mocked<Logger> = {
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  time: jest.fn(),
  timeEnd: jest.fn().mockReturnValue(0),
  timeLog: jest.fn(),
};

const mockHashService: jest.Mocked<HashService> = {
  computeFileHash: jest.fn(),
};

describe('UpdateRegistry', () => {
  let dir: string;

  beforeEach(async () => {
    jest.clearAllMocks();
    mockHashService.computeFileHash.mockImplementation(async (filePath) => `hash-of-${path.basename(filePath)}`);
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'update-registry-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function createRegistry(channel: UpdateChannel = CHANNELS.default, directory: string = dir): UpdateRegistry {
    return new UpdateRegistry({
      directory,
      channel,
      hashService: mockHashService,
      metadataReader: new IniMetadataReader(),
      logger: mockLogger,
    });
  }

  async function writeFile(name: string, content: string, modified: string): Promise<void> {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, content);
    const time = new Date(modified);
    await fs.utimes(filePath, time, time);
  }

  describe('initialize', () => {
    it('should refuse to start when no update matches', async () => {
      await writeFile('application_20130101000000.ini', '[App]\nBuildID=1\nVersion=1.0\n', '2013-01-01T00:00:00Z');
      await writeFile('b2g_update_20130101000000.zip', 'zip', '2013-01-01T00:00:00Z');
      const registry = createRegistry();

      await expect(registry.initialize()).rejects.toThrow(NoUpdatesError);
      await expect(registry.initialize()).rejects.toThrow(`No updates found in ${dir}`);
      expect(registry.current).toBeNull();
    });

    it('should fail with a scan error when the directory does not exist', async () => {
      const registry = createRegistry(CHANNELS.default, path.join(dir, 'missing'));

      await expect(registry.initialize()).rejects.toThrow(ScanError);
    });

    it('should select the current update on startup', async () => {
      await writeFile('b2g_update_20130101000000.mar', 'x'.repeat(100), '2013-01-01T00:00:00Z');
      const registry = createRegistry();

      await registry.initialize();

      expect(registry.size).toBe(1);
      expect(registry.current?.filename).toBe('b2g_update_20130101000000.mar');
      expect(registry.current?.size).toBe(100);
      expect(registry.current?.modifiedTime.toISOString()).toBe('2013-01-01T00:00:00.000Z');
    });
  });

  describe('scan', () => {
    it('should pick the newest file regardless of its name', async () => {
      await writeFile('b2g_update_20130102000000.mar', 'older', '2013-01-01T00:00:00Z');
      await writeFile('b2g_update_20130101000000.mar', 'newer', '2013-02-01T00:00:00Z');
      const registry = createRegistry();

      await registry.scan();

      expect(registry.current?.filename).toBe('b2g_update_20130101000000.mar');
    });

    it('should compare modification times below millisecond precision', async () => {
      await writeFile('b2g_update_1.mar', 'newer', '2013-01-01T00:00:00Z');
      await writeFile('b2g_update_2.mar', 'older', '2013-01-01T00:00:00Z');
      await fs.utimes(path.join(dir, 'b2g_update_1.mar'), 1700000000.0004, 1700000000.0004);
      await fs.utimes(path.join(dir, 'b2g_update_2.mar'), 1700000000.0001, 1700000000.0001);
      const registry = createRegistry();

      await registry.scan();

      expect(registry.current?.filename).toBe('b2g_update_1.mar');
    });

    it('should break modification time ties by the greatest filename', async () => {
      await writeFile('b2g_update_a.mar', 'a', '2013-01-01T00:00:00Z');
      await writeFile('b2g_update_c.mar', 'c', '2013-01-01T00:00:00Z');
      await writeFile('b2g_update_b.mar', 'b', '2013-01-01T00:00:00Z');
      const registry = createRegistry();

      await registry.scan();

      expect(registry.current?.filename).toBe('b2g_update_c.mar');
    });

    it('should only track files of its own channel', async () => {
      await writeFile('b2g_update_20130101000000.mar', 'nightly', '2013-03-01T00:00:00Z');
      await writeFile('b2g_stable_update_20121201000000.mar', 'stable', '2012-12-01T00:00:00Z');
      const registry = createRegistry(CHANNELS.stable);

      await registry.scan();

      expect(registry.entries().map((e) => e.filename)).toEqual(['b2g_stable_update_20121201000000.mar']);
      expect(registry.current?.versionStamp).toBe('20121201000000');
    });

    it('should pick up a newer file on rescan', async () => {
      await writeFile('b2g_update_20130101000000.mar', 'first', '2013-01-01T00:00:00Z');
      const registry = createRegistry();
      await registry.initialize();

      await writeFile('b2g_update_20130201000000.mar', 'second', '2013-02-01T00:00:00Z');
      await registry.scan();

      expect(registry.size).toBe(2);
      expect(registry.current?.filename).toBe('b2g_update_20130201000000.mar');
    });

    it('should keep an unchanged entry and its cached hash across scans', async () => {
      await writeFile('b2g_update_20130101000000.mar', 'content', '2013-01-01T00:00:00Z');
      const registry = createRegistry();
      await registry.scan();
      const first = registry.current;
      await first?.hash();

      await registry.scan();
      await registry.current?.hash();

      expect(registry.current).toBe(first);
      expect(mockHashService.computeFileHash).toHaveBeenCalledTimes(1);
    });

    it('should replace an entry whose file changed on disk', async () => {
      await writeFile('b2g_update_20130101000000.mar', 'content', '2013-01-01T00:00:00Z');
      const registry = createRegistry();
      await registry.scan();
      const first = registry.current;
      await first?.hash();

      await writeFile('b2g_update_20130101000000.mar', 'rebuilt content', '2013-01-05T00:00:00Z');
      await registry.scan();
      await registry.current?.hash();

      expect(registry.current).not.toBe(first);
      expect(registry.current?.size).toBe(15);
      expect(mockHashService.computeFileHash).toHaveBeenCalledTimes(2);
    });

    it('should time each hash run under its own label', async () => {
      await writeFile('b2g_update_20130101000000.mar', 'content', '2013-01-01T00:00:00Z');
      const registry = createRegistry();
      await registry.scan();
      const first = registry.current;

      await writeFile('b2g_update_20130101000000.mar', 'rebuilt content', '2013-01-05T00:00:00Z');
      await registry.scan();
      await Promise.all([first?.hash(), registry.current?.hash()]);

      const started = mockLogger.time.mock.calls.map(([label]) => label);
      const ended = mockLogger.timeEnd.mock.calls.map(([label]) => label);
      expect(started).toHaveLength(2);
      expect(started[0]).toMatch(/^hash-b2g_update_20130101000000\.mar#\d+$/);
      expect(started[1]).toMatch(/^hash-b2g_update_20130101000000\.mar#\d+$/);
      expect(started[0]).not.toBe(started[1]);
      expect([...ended].sort()).toEqual([...started].sort());
    });

    it('should keep serving a deleted file from the cache', async () => {
      await writeFile('b2g_update_20130101000000.mar', 'old', '2013-01-01T00:00:00Z');
      await writeFile('b2g_update_20130201000000.mar', 'new', '2013-02-01T00:00:00Z');
      const registry = createRegistry();
      await registry.scan();

      await fs.rm(path.join(dir, 'b2g_update_20130201000000.mar'));
      await registry.scan();

      expect(registry.size).toBe(2);
      expect(registry.current?.filename).toBe('b2g_update_20130201000000.mar');
    });

    it('should reject with a scan error and keep the previous state when the directory disappears', async () => {
      await writeFile('b2g_update_20130101000000.mar', 'content', '2013-01-01T00:00:00Z');
      const registry = createRegistry();
      await registry.scan();
      const before = registry.current;

      await fs.rm(dir, { recursive: true, force: true });

      await expect(registry.scan()).rejects.toThrow(`Cannot list update directory ${dir}`);
      expect(registry.current).toBe(before);
    });

    it('should run overlapping scans one after another', async () => {
      await writeFile('b2g_update_20130101000000.mar', 'one', '2013-01-01T00:00:00Z');
      await writeFile('b2g_update_20130201000000.mar', 'two', '2013-02-01T00:00:00Z');
      const registry = createRegistry();

      await Promise.all([registry.scan(), registry.scan(), registry.scan()]);

      expect(registry.size).toBe(2);
      expect(registry.current?.filename).toBe('b2g_update_20130201000000.mar');
    });

    it('should still scan after a failed scan', async () => {
      const registry = createRegistry(CHANNELS.default, path.join(dir, 'later'));
      await expect(registry.scan()).rejects.toThrow(ScanError);

      await fs.mkdir(path.join(dir, 'later'));
      await fs.writeFile(path.join(dir, 'later', 'b2g_update_1.mar'), 'x');
      await registry.scan();

      expect(registry.current?.filename).toBe('b2g_update_1.mar');
    });
  });
});

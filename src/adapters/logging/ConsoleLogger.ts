import { Logger, LogLevel } from '../../core/services/Logger';
import fs from 'fs';
import path from 'path';

export type RotationMode = 'none' | 'daily' | 'size';

export interface FileLogOptions {
  rotate?: RotationMode;
  maxSizeBytes?: number;
  maxFiles?: number;
  /** Clock for line timestamps and daily file names. */
  now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const CONSOLE_METHOD: Record<LogLevel, (message: string, ...args: unknown[]) => void> = {
  debug: (message, ...args) => console.debug(message, ...args),
  info: (message, ...args) => console.info(message, ...args),
  warn: (message, ...args) => console.warn(message, ...args),
  error: (message, ...args) => console.error(message, ...args),
};

/**
 * Writes `[timestamp] [LEVEL] message` lines to the console and, when a
 * file path is given, appends them to a log file with optional rotation.
 */
export class ConsoleLogger implements Logger {
  private timers: Map<string, number> = new Map();
  private stream?: fs.WriteStream;
  private readonly rotation: RotationMode;
  private readonly maxSizeBytes: number;
  private readonly maxFiles: number;
  private currentDateToken?: string; // YYYY-MM-DD for daily rotation
  private currentSize = 0;
  private draining: Promise<void>[] = [];
  private readonly now: () => Date;

  constructor(
    private readonly logLevel: LogLevel = 'info',
    private readonly filePath?: string,
    options: FileLogOptions = {}
  ) {
    this.rotation = options.rotate ?? 'none';
    this.maxSizeBytes = options.maxSizeBytes ?? 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;
    this.now = options.now ?? (() => new Date());
    if (filePath) this.openStream(filePath);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  time(label: string): void {
    this.timers.set(label, Date.now());
    this.debug(`Timer '${label}' started`);
  }

  timeEnd(label: string): number {
    const startTime = this.timers.get(label);
    if (startTime === undefined) {
      this.warn(`Timer '${label}' does not exist`);
      return 0;
    }

    const duration = Date.now() - startTime;
    this.timers.delete(label);
    this.info(`Timer '${label}': ${duration}ms`);
    return duration;
  }

  timeLog(label: string, message?: string, ...args: unknown[]): void {
    const startTime = this.timers.get(label);
    if (startTime === undefined) {
      this.warn(`Timer '${label}' does not exist`);
      return;
    }

    const duration = Date.now() - startTime;
    const logMessage = message ? `${message} (${duration}ms)` : `Timer '${label}': ${duration}ms`;
    this.info(logMessage, ...args);
  }

  /** Flushes and closes the log file, including files left behind by rotation. */
  async close(): Promise<void> {
    if (this.stream) this.retireStream(this.stream);
    this.stream = undefined;
    const pending = this.draining;
    this.draining = [];
    await Promise.all(pending);
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.logLevel]) return;
    const line = `[${this.now().toISOString()}] [${level.toUpperCase()}] ${message}`;
    CONSOLE_METHOD[level](line, ...args);
    this.writeToFile(line, args);
  }

  private writeToFile(line: string, args: unknown[]): void {
    if (!this.stream) return;
    const extras = args.length ? ' ' + args.map(stringify).join(' ') : '';
    const text = `${line}${extras}\n`;
    const bytes = Buffer.byteLength(text, 'utf8');
    this.rotateIfNeeded(bytes);
    if (!this.stream) return;
    this.stream.write(text);
    this.currentSize += bytes;
  }

  private openStream(basePath: string): void {
    fs.mkdirSync(path.dirname(basePath), { recursive: true });
    let targetPath = basePath;
    if (this.rotation === 'daily') {
      this.currentDateToken = dateToken(this.now());
      targetPath = dailyPath(basePath, this.currentDateToken);
    }
    // Opened synchronously so the file exists before the next rotation check
    const fd = fs.openSync(targetPath, 'a');
    this.currentSize = fs.fstatSync(fd).size;
    this.stream = fs.createWriteStream(targetPath, { fd, encoding: 'utf8' });
  }

  private retireStream(stream: fs.WriteStream): void {
    this.draining.push(new Promise<void>((resolve) => stream.end(() => resolve())));
  }

  private rotateIfNeeded(extraBytes: number): void {
    if (!this.filePath || !this.stream) return;

    if (this.rotation === 'daily' && dateToken(this.now()) !== this.currentDateToken) {
      this.retireStream(this.stream);
      this.openStream(this.filePath);
      this.pruneDailyFiles(this.filePath);
      return;
    }

    if (this.rotation === 'size' && this.currentSize + extraBytes > this.maxSizeBytes) {
      // app.log -> app.log.1 -> ... -> app.log.<maxFiles>
      this.retireStream(this.stream);
      for (let i = this.maxFiles - 1; i >= 1; i--) {
        const src = `${this.filePath}.${i}`;
        if (fs.existsSync(src)) fs.renameSync(src, `${this.filePath}.${i + 1}`);
      }
      if (fs.existsSync(this.filePath)) fs.renameSync(this.filePath, `${this.filePath}.1`);
      this.openStream(this.filePath);
    }
  }

  private pruneDailyFiles(basePath: string): void {
    const dir = path.dirname(basePath);
    const ext = path.extname(basePath) || '.log';
    const prefix = path.basename(basePath, path.extname(basePath)) + '-';
    // YYYY-MM-DD tokens sort chronologically
    const entries = fs
      .readdirSync(dir)
      .filter((f) => f.startsWith(prefix) && f.endsWith(ext))
      .sort();
    for (const f of entries.slice(0, Math.max(0, entries.length - this.maxFiles))) {
      fs.unlinkSync(path.join(dir, f));
    }
  }
}

function dateToken(d: Date = new Date()): string {
  const mm = String(d.getMonth() + 1).padStart(2, '0');
  const dd = String(d.getDate()).padStart(2, '0');
  return `${d.getFullYear()}-${mm}-${dd}`;
}

function dailyPath(basePath: string, token: string): string {
  const ext = path.extname(basePath);
  const name = path.basename(basePath, ext);
  return path.join(path.dirname(basePath), `${name}-${token}${ext || '.log'}`);
}

function stringify(arg: unknown): string {
  if (arg instanceof Error) {
    return `${arg.name}: ${arg.message}${arg.stack ? `\n${arg.stack}` : ''}`;
  }
  if (typeof arg === 'string') return arg;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

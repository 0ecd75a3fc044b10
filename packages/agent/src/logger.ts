import { createWriteStream, existsSync, mkdirSync, readdirSync, unlinkSync, type WriteStream } from 'fs';
import { join } from 'path';
import { Writable } from 'stream';
import pino, { multistream, type Level, type StreamEntry } from 'pino';

const DEFAULT_RETENTION_DAYS = 14;
const VALID_LEVELS: Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

const LEVEL_LABELS: Record<number, string> = {
  10: 'TRACE',
  20: 'DEBUG',
  30: 'INFO',
  40: 'WARN',
  50: 'ERROR',
  60: 'FATAL'
};

type LogLine = {
  time?: number;
  level?: number;
  msg?: string;
  err?: { message?: unknown };
  proc?: unknown;
  [key: string]: unknown;
};

function isLevel(value: string): value is Level {
  return VALID_LEVELS.some((level) => level === value);
}

function envLogLevel(): Level | null {
  const requested = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
  return isLevel(requested) ? requested : null;
}

function safeWarn(...args: unknown[]) {
  try {
    // eslint-disable-next-line no-console
    console.warn(...args);
  } catch {
    const text = args.map((a) => (a instanceof Error ? a.stack || a.message : String(a))).join(' ');
    process.stderr.write(`[WARN] ${text}\n`);
  }
}

/** `LEVEL proc | HH:MM:SS DD Mon | message - err` */
export function formatLogLine(raw: string): string {
  let parsed: LogLine;
  try {
    parsed = JSON.parse(raw) as LogLine;
  } catch {
    return raw.trimEnd();
  }
  const date = new Date(typeof parsed.time === 'number' ? parsed.time : Date.now());
  const hhmmss = date.toLocaleTimeString('en-GB', { hour12: false });
  const day = String(date.getDate()).padStart(2, '0');
  const mon = date.toLocaleString('en-GB', { month: 'short' });
  const levelLabel = typeof parsed.level === 'number' ? LEVEL_LABELS[parsed.level] ?? 'INFO' : 'INFO';
  const proc = typeof parsed.proc === 'string' ? parsed.proc : 'agent';
  const errMsg = typeof parsed.err?.message === 'string' ? ` - ${parsed.err.message}` : '';
  return `${levelLabel} ${proc} | ${hhmmss} ${day} ${mon} | ${parsed.msg ?? ''}${errMsg}`;
}

class RotatingFileStream extends Writable {
  private currentDate: string | null = null;
  private stream: WriteStream | null = null;
  private cleanupScheduled = false;

  constructor(private readonly directory: string, private readonly retention: number) {
    super();
  }

  private formatDateKey(epochMs: number) {
    const date = new Date(epochMs);
    const yyyy = date.getFullYear();
    const mm = String(date.getMonth() + 1).padStart(2, '0');
    const dd = String(date.getDate()).padStart(2, '0');
    return `${yyyy}-${mm}-${dd}`;
  }

  private scheduleCleanup() {
    if (this.cleanupScheduled) return;
    this.cleanupScheduled = true;
    const timer = setTimeout(() => {
      this.cleanupScheduled = false;
      try {
        const entries = readdirSync(this.directory)
          .filter((name) => name.endsWith('.log'))
          .sort();
        const allowed = Math.max(this.retention, 1);
        for (const file of entries.slice(0, Math.max(entries.length - allowed, 0))) {
          try {
            unlinkSync(join(this.directory, file));
          } catch (err) {
            safeWarn('logger: failed to prune log file', err);
          }
        }
      } catch (err) {
        safeWarn('logger: failed to enumerate log directory', err);
      }
    }, 1_000);
    if (typeof timer.unref === 'function') timer.unref();
  }

  private rotateIfNeeded(dateKey: string) {
    if (this.currentDate === dateKey && this.stream) return;
    this.stream?.end();
    const target = createWriteStream(join(this.directory, `${dateKey}.log`), { flags: 'a' });
    target.on('error', (err) => {
      safeWarn('logger: file stream error; reopening on next write', err);
      this.stream = null;
    });
    this.stream = target;
    this.currentDate = dateKey;
    this.scheduleCleanup();
  }

  override _write(chunk: Buffer | string, encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    try {
      const text = Buffer.isBuffer(chunk) ? chunk.toString('utf8') : Buffer.from(chunk, encoding).toString('utf8');
      let time = Date.now();
      try {
        const parsed = JSON.parse(text) as LogLine;
        if (typeof parsed.time === 'number') time = parsed.time;
      } catch {
        // raw text keeps the current date
      }
      this.rotateIfNeeded(this.formatDateKey(time));
      this.stream?.write(`${formatLogLine(text)}\n`);
      callback();
    } catch (err) {
      callback(err instanceof Error ? err : new Error(String(err)));
    }
  }

  override _final(callback: (error?: Error | null) => void) {
    if (this.stream) {
      this.stream.end(callback);
    } else {
      callback();
    }
  }
}

class CleanConsoleStream extends Writable {
  override _write(chunk: Buffer | string, encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    const text = Buffer.isBuffer(chunk) ? chunk.toString('utf8') : Buffer.from(chunk, encoding).toString('utf8');
    // eslint-disable-next-line no-console
    console.log(formatLogLine(text));
    callback();
  }
}

const streams = multistream([{ stream: new CleanConsoleStream(), level: 'trace' } satisfies StreamEntry]);

export const logger = pino({ level: envLogLevel() ?? 'info' }, streams);

let logDir: string | null = null;

export type LoggingOptions = {
  directory: string;
  level?: Level;
  retentionDays?: number;
};

/**
 * Adds the daily log file once the configured directory is known.
 * `LOG_LEVEL` always wins over the configured level.
 */
export function configureLogging(options: LoggingOptions): void {
  logger.level = envLogLevel() ?? options.level ?? 'info';
  if (logDir === options.directory) return;
  if (!existsSync(options.directory)) {
    mkdirSync(options.directory, { recursive: true });
  }
  streams.add({
    stream: new RotatingFileStream(options.directory, options.retentionDays ?? DEFAULT_RETENTION_DAYS),
    level: 'trace'
  });
  logDir = options.directory;
  logger.debug({ logDir }, 'logger: file output enabled');
}

export function getLogDirectory(): string | null {
  return logDir;
}

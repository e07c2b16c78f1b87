// src/logger.ts
import fs from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';
import { format } from 'date-fns';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

const RANK: Record<LogThreshold, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

export interface LogSink {
  write(level: LogLevel, line: string): void;
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
  setLevel(level: LogThreshold): void;
  getLevel(): LogThreshold;
  setSinks(sinks: LogSink[]): void;
}

export function parseLevel(raw: string | undefined, fallback: LogThreshold = 'debug'): LogThreshold {
  const v = (raw ?? '').trim().toLowerCase();
  if (v === 'warning') return 'warn';
  if (v === 'critical') return 'error';
  return isThreshold(v) ? v : fallback;
}

function isThreshold(v: string): v is LogThreshold {
  return Object.prototype.hasOwnProperty.call(RANK, v);
}

export function formatLine(level: LogLevel, msg: string, at: Date): string {
  return `${format(at, "yyyy-MM-dd'T'HH:mm:ss.SSSxxx")} [${level.toUpperCase().padStart(5)}] ${msg}`;
}

const colour: Record<LogLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export const consoleSink: LogSink = {
  write(level, line) {
    const out = level === 'error' || level === 'warn' ? process.stderr : process.stdout;
    out.write(colour[level](line) + '\n');
  },
};

/**
 * Appends to `<dir>/<filename>` and rotates at local midnight.
 * Rotated files get a `.yyyy-MM-dd` suffix; only the newest `backupCount` are kept.
 */
export class DailyRotatingFileSink implements LogSink {
  private readonly file: string;
  private currentDay: string;

  constructor(
    private readonly dir: string,
    private readonly filename: string,
    private readonly backupCount = 7,
    private readonly now: () => Date = () => new Date(),
  ) {
    fs.mkdirSync(dir, { recursive: true });
    this.file = path.join(dir, filename);
    this.currentDay = fs.existsSync(this.file)
      ? format(fs.statSync(this.file).mtime, 'yyyy-MM-dd')
      : format(this.now(), 'yyyy-MM-dd');
  }

  write(_level: LogLevel, line: string): void {
    const today = format(this.now(), 'yyyy-MM-dd');
    if (today !== this.currentDay) {
      this.rotate();
      this.currentDay = today;
    }
    fs.appendFileSync(this.file, line + '\n');
  }

  private rotate(): void {
    if (fs.existsSync(this.file)) {
      fs.renameSync(this.file, `${this.file}.${this.currentDay}`);
    }
    const prefix = this.filename + '.';
    const backups = fs.readdirSync(this.dir)
      .filter(f => f.startsWith(prefix))
      .sort()
      .reverse();
    for (const old of backups.slice(this.backupCount)) {
      fs.unlinkSync(path.join(this.dir, old));
    }
  }
}

export function createLogger(level: LogThreshold, sinks: LogSink[], now: () => Date = () => new Date()): Logger {
  let current = level;
  let targets = sinks;

  function emit(lvl: LogLevel, msg: string) {
    if (RANK[lvl] < RANK[current]) return;
    const line = formatLine(lvl, msg, now());
    for (const s of targets) {
      try {
        s.write(lvl, line);
      } catch (err) {
        // sink failures are reported, never thrown
        process.stderr.write(`log sink failed: ${String(err)}\n`);
      }
    }
  }

  return {
    debug: msg => emit('debug', msg),
    info: msg => emit('info', msg),
    warn: msg => emit('warn', msg),
    error: (msg, err) => {
      if (err === undefined) return emit('error', msg);
      const detail = err instanceof Error ? (err.stack ?? err.message) : String(err);
      emit('error', `${msg}: ${detail}`);
    },
    setLevel: l => { current = l; },
    getLevel: () => current,
    setSinks: s => { targets = s; },
  };
}

export const logger = createLogger(parseLevel(process.env.LOGLEVEL), [consoleSink]);

/** Adds the rotating file next to the console output */
export function configureLogging(opts: { level: LogThreshold; logsDir: string; toFile: boolean; filename?: string }): void {
  logger.setLevel(opts.level);
  const sinks: LogSink[] = [consoleSink];
  if (opts.toFile) {
    sinks.push(new DailyRotatingFileSink(opts.logsDir, opts.filename ?? 'controller.log'));
  }
  logger.setSinks(sinks);
}

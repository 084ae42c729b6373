export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'human';

export type LogFields = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

// ANSI color codes
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

const LEVEL_STYLES: Record<LogLevel, { icon: string; color: string }> = {
  debug: { icon: '🔍', color: COLORS.gray },
  info: { icon: 'ℹ️ ', color: COLORS.blue },
  warn: { icon: '⚠️ ', color: COLORS.yellow },
  error: { icon: '❌', color: COLORS.red }
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

export function isLogFormat(value: unknown): value is LogFormat {
  return value === 'json' || value === 'human';
}

export class Logger {
  constructor(
    private level: LogLevel = 'info',
    private format: LogFormat = 'human'
  ) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setFormat(format: LogFormat): void {
    this.format = format;
  }

  private should(level: LogLevel) {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private formatTime(date: Date): string {
    return date.toLocaleTimeString('en-US', {
      hour12: false,
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit'
    });
  }

  private formatFields(fields?: LogFields): string {
    if (!fields || Object.keys(fields).length === 0) return '';

    const formatted = Object.entries(fields)
      .map(([key, value]) => {
        const valueStr = typeof value === 'string' ? value : JSON.stringify(value);
        return `${COLORS.dim}${key}=${valueStr}${COLORS.reset}`;
      })
      .join(' ');

    return ` ${formatted}`;
  }

  private stream(level: LogLevel): NodeJS.WriteStream {
    // warnings and errors stay visible when stdout is redirected
    return LEVEL_ORDER[level] >= LEVEL_ORDER.warn ? process.stderr : process.stdout;
  }

  private writeHuman(level: LogLevel, msg: string, fields?: LogFields) {
    const { icon, color } = LEVEL_STYLES[level];
    const timestamp = `${COLORS.gray}${this.formatTime(new Date())}${COLORS.reset}`;
    const levelStr = `${color}${level.toUpperCase()}${COLORS.reset}`;

    this.stream(level).write(`${timestamp} ${icon} ${levelStr} ${msg}${this.formatFields(fields)}\n`);
  }

  private writeJson(level: LogLevel, msg: string, fields?: LogFields) {
    const rec = {
      level,
      msg,
      time: new Date().toISOString(),
      ...fields
    };
    this.stream(level).write(JSON.stringify(rec) + '\n');
  }

  private write(level: LogLevel, msg: string, fields?: LogFields) {
    if (!this.should(level)) return;

    if (this.format === 'human') {
      this.writeHuman(level, msg, fields);
    } else {
      this.writeJson(level, msg, fields);
    }
  }

  debug(msg: string, fields?: LogFields) { this.write('debug', msg, fields); }
  info(msg: string, fields?: LogFields) { this.write('info', msg, fields); }
  warn(msg: string, fields?: LogFields) { this.write('warn', msg, fields); }
  error(msg: string, fields?: LogFields) { this.write('error', msg, fields); }
}

const envLevel = process.env.LOG_LEVEL;
const envFormat = process.env.LOG_FORMAT;

export const logger = new Logger(
  isLogLevel(envLevel) ? envLevel : 'info',
  isLogFormat(envFormat) ? envFormat : 'human'
);

import chalk from 'chalk';

export enum LogLevel { DEBUG = 0, INFO = 1, WARN = 2, ERROR = 3 }

type Sink = (...data: unknown[]) => void;

interface Channel {
  label: string;
  paint: (text: string) => string;
  sink: () => Sink;
}

// Sinks resolve per call so tests can spy on console
const CHANNELS: Record<'debug' | 'info' | 'warn' | 'error' | 'success', Channel> = {
  debug: { label: 'DEBUG', paint: chalk.gray, sink: () => console.log },
  info: { label: 'INFO', paint: chalk.blue, sink: () => console.log },
  warn: { label: 'WARN', paint: chalk.yellow, sink: () => console.warn },
  error: { label: 'ERROR', paint: chalk.red, sink: () => console.error },
  success: { label: 'SUCCESS', paint: chalk.green, sink: () => console.log }
};

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR
};

export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) return undefined;
  return LEVEL_NAMES[name.trim().toLowerCase()];
}

/**
 * Console logger gated by level. `success` lines always print: they carry
 * the few results a quiet run still reports.
 */
export class Logger {
  // Quiet by default: per-request failures only show up with --verbose
  private level: LogLevel;

  constructor(level: LogLevel = parseLogLevel(process.env.LOADCANNON_LOG_LEVEL) ?? LogLevel.WARN) {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return this.level <= level;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.DEBUG)) this.emit(CHANNELS.debug, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.INFO)) this.emit(CHANNELS.info, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.WARN)) this.emit(CHANNELS.warn, message, args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.ERROR)) this.emit(CHANNELS.error, message, args);
  }

  success(message: string, ...args: unknown[]): void {
    this.emit(CHANNELS.success, message, args);
  }

  private emit(channel: Channel, message: string, args: unknown[]): void {
    channel.sink()(channel.paint(`[${channel.label}] ${message}`), ...args);
  }
}

export const logger = new Logger();

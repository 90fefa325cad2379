/**
 * 診断ログ
 *
 * stdoutはMCPの通信路のため、出力は常にstderr（既定のsink）。
 * text: `[<ISO時刻>] <LEVEL>: <message>`
 * json: 1行1オブジェクト（timestamp, level, message, module, 追加フィールド）
 */
import type { LogFormat, LogLevel } from '../config/env.js';

const SEVERITY: Readonly<Record<LogLevel, number>> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

export type LogFields = Readonly<Record<string, unknown>>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  name: string;
  level: LogLevel;
  format: LogFormat;
  sink?: (line: string) => void;
  now?: () => Date;
}

export function createLogger(options: LoggerOptions): Logger {
  const sink = options.sink ?? ((line: string) => console.error(line));
  const now = options.now ?? (() => new Date());
  const threshold = SEVERITY[options.level];

  const emit = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (SEVERITY[level] < threshold) return;
    const timestamp = now().toISOString();

    if (options.format === 'json') {
      sink(JSON.stringify({ timestamp, level, message, module: options.name, ...fields }));
      return;
    }
    const extra = fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
    sink(`[${timestamp}] ${level}: ${message}${extra}`);
  };

  return {
    debug: (message, fields) => emit('DEBUG', message, fields),
    info: (message, fields) => emit('INFO', message, fields),
    warn: (message, fields) => emit('WARNING', message, fields),
    error: (message, fields) => emit('ERROR', message, fields),
  };
}

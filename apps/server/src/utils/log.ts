/**
 * 结构化日志工具
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function threshold(): number {
  const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
}

export function log(level: LogLevel, event: string, data?: object): void {
  if (LEVEL_ORDER[level] < threshold()) return;
  console.log(JSON.stringify({
    ts: new Date().toISOString(),
    level,
    event,
    ...data,
  }));
}

/** 任意 throw 值转成可展示的一行文本 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

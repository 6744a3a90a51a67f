import { destination, pino, type Logger } from 'pino';

/**
 * Structured logging for outline-chat.
 *
 * Logs go to stderr: stdout carries CLI JSON output and the MCP stdio stream.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : 'warn';
}

export function createLogger(level: LogLevel = resolveLogLevel(process.env.OUTLINE_CHAT_LOG_LEVEL)): Logger {
  return pino({ name: 'outline-chat', level }, destination(2));
}

export const logger = createLogger();

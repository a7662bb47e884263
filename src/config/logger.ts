type Level = 'info' | 'warn' | 'error';

export interface Logger {
  log(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

function write(level: Level, message: string, meta: unknown[]) {
  const line = `${new Date().toISOString()} [${level}] ${message}`;
  if (level === 'error') console.error(line, ...meta);
  else if (level === 'warn') console.warn(line, ...meta);
  else console.log(line, ...meta);
}

export const log = (message: string, ...meta: unknown[]) => write('info', message, meta);
export const warn = (message: string, ...meta: unknown[]) => write('warn', message, meta);
export const error = (message: string, ...meta: unknown[]) => write('error', message, meta);

export const logger: Logger = { log, warn, error };

// For tests and scripts that should stay quiet
export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

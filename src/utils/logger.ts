export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

let currentLevel: LogLevel = 'INFO';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Write a log line to stderr; stdout belongs to the MCP stdio transport
 */
export function log(level: LogLevel, message: string, ...args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  const timestamp = new Date().toISOString();
  console.error(`[${timestamp}] [${level}] ${message}`, ...args);
}

// Redirect stray console.log calls so they cannot corrupt the stdio transport
export function enableStdoutGuard(): void {
  console.log = (...args: unknown[]) => {
    console.error('[WARN] console.log intercepted (would corrupt stdio):', ...args);
  };
}

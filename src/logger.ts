import chalk from 'chalk';

import type { LogLevel } from '../config.js';

export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createLogger(
  options: { level?: LogLevel; write?: (line: string) => void } = {},
): Logger {
  const threshold = SEVERITY[options.level ?? 'info'];
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

  const emit = (level: Exclude<LogLevel, 'silent'>, paint: (s: string) => string) =>
    (msg: string) => {
      if (SEVERITY[level] < threshold) return;
      write(paint(`recollect: ${msg}`));
    };

  return {
    debug: emit('debug', chalk.gray),
    info: emit('info', s => s),
    warn: emit('warn', chalk.yellow),
    error: emit('error', chalk.red),
  };
}

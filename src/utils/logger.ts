import type { LogLevel } from '../types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const PREFIX = '[trip-analyzer]';

let currentLevel: LogLevel = 'info';

const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];

export const logger = {
  setLevel: (level: LogLevel) => {
    currentLevel = level;
  },
  debug: (...args: unknown[]) => {
    if (enabled('debug')) console.debug(PREFIX, ...args);
  },
  info: (...args: unknown[]) => {
    if (enabled('info')) console.log(PREFIX, ...args);
  },
  warn: (...args: unknown[]) => {
    if (enabled('warn')) console.warn(PREFIX, ...args);
  },
  error: (...args: unknown[]) => {
    if (enabled('error')) console.error(PREFIX, ...args);
  },
};

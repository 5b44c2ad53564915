import { z } from 'zod';
import { ConfigError } from './errors';
import { type AppConfig, type Outcome, failure, success } from './types';
import {
  DEFAULT_LOWER_BOUND_SECONDS,
  DEFAULT_SIGNIFICANT_DIGITS,
  DEFAULT_UPPER_BOUND_SECONDS,
} from './utils/hourlyHistogram';

const EnvSchema = z.object({
  TRIP_HISTOGRAM_LOWER_SECONDS: z.coerce.number().int().positive().default(DEFAULT_LOWER_BOUND_SECONDS),
  TRIP_HISTOGRAM_UPPER_SECONDS: z.coerce.number().int().positive().default(DEFAULT_UPPER_BOUND_SECONDS),
  TRIP_HISTOGRAM_SIGNIFICANT_DIGITS: z.coerce.number().int().min(1).max(5).default(DEFAULT_SIGNIFICANT_DIGITS),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

/** Reads settings from the environment; empty variables count as unset. */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Outcome<AppConfig, ConfigError> => {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    return failure(new ConfigError(`Invalid configuration: ${details}`));
  }

  const cfg = parsed.data;
  if (cfg.TRIP_HISTOGRAM_LOWER_SECONDS >= cfg.TRIP_HISTOGRAM_UPPER_SECONDS) {
    return failure(new ConfigError(
      `TRIP_HISTOGRAM_LOWER_SECONDS (${cfg.TRIP_HISTOGRAM_LOWER_SECONDS}) must be below TRIP_HISTOGRAM_UPPER_SECONDS (${cfg.TRIP_HISTOGRAM_UPPER_SECONDS})`
    ));
  }

  return success({
    histogram: {
      lowerBoundSeconds: cfg.TRIP_HISTOGRAM_LOWER_SECONDS,
      upperBoundSeconds: cfg.TRIP_HISTOGRAM_UPPER_SECONDS,
      significantDigits: cfg.TRIP_HISTOGRAM_SIGNIFICANT_DIGITS,
    },
    logLevel: cfg.LOG_LEVEL,
  });
};

import { ConfigError, DurationError } from '../errors';
import { type DurationOutcome, type Outcome, failure, success } from '../types';
import { LogLinearHistogram } from './logLinearHistogram';
import { type ParsedTime, durationSeconds } from './timeParser';

export const HOURS_PER_DAY = 24;

// Shorter trips to JFK are treated as bad data, not fast rides
export const MIN_TRIP_SECONDS = 20 * 60;

export const DEFAULT_LOWER_BOUND_SECONDS = 1;
export const DEFAULT_UPPER_BOUND_SECONDS = 3 * 60 * 60;
export const DEFAULT_SIGNIFICANT_DIGITS = 3;

/**
 * Trip durations split by pickup hour, one log-linear histogram per hour.
 */
export class HourlyHistogram {
  private constructor(private readonly hours: readonly LogLinearHistogram[]) {}

  static create(
    lowerBoundSeconds = DEFAULT_LOWER_BOUND_SECONDS,
    upperBoundSeconds = DEFAULT_UPPER_BOUND_SECONDS,
    significantDigits = DEFAULT_SIGNIFICANT_DIGITS
  ): Outcome<HourlyHistogram, ConfigError> {
    if (lowerBoundSeconds <= 0 || upperBoundSeconds <= 0) {
      return failure(new ConfigError(`Histogram bounds must be positive, got [${lowerBoundSeconds}, ${upperBoundSeconds}]`));
    }
    if (lowerBoundSeconds >= upperBoundSeconds) {
      return failure(new ConfigError(`Histogram bounds are inverted: [${lowerBoundSeconds}, ${upperBoundSeconds}]`));
    }

    const hours: LogLinearHistogram[] = [];
    for (let hour = 0; hour < HOURS_PER_DAY; hour++) {
      const created = LogLinearHistogram.create({
        lowestDiscernibleValue: lowerBoundSeconds,
        highestTrackableValue: upperBoundSeconds,
        significantDigits,
      });
      if (created.type === 'ERROR') return created;
      hours.push(created.value);
    }
    return success(new HourlyHistogram(Object.freeze(hours)));
  }

  recordDuration(pickup: ParsedTime, dropoff: ParsedTime): DurationOutcome {
    const duration = durationSeconds(pickup, dropoff);
    if (duration < 0) return failure(new DurationError('NEGATIVE', duration));
    if (duration < MIN_TRIP_SECONDS) return failure(new DurationError('TOO_SHORT', duration));

    if (duration > this.upperBoundSeconds) return failure(new DurationError('TOO_LONG', duration));

    const hour = pickup.hour;
    // Only a lower bound configured above the floor can refuse the value here
    if (!this.hours[hour].record(duration)) return failure(new DurationError('TOO_SHORT', duration));
    return success({ hour, duration });
  }

  hour(hour: number): LogLinearHistogram {
    if (!Number.isInteger(hour) || hour < 0 || hour >= HOURS_PER_DAY) {
      throw new RangeError(`Hour must be an integer in 0..23, got ${hour}`);
    }
    return this.hours[hour];
  }

  *entries(): Generator<[number, LogLinearHistogram]> {
    for (let hour = 0; hour < HOURS_PER_DAY; hour++) {
      yield [hour, this.hours[hour]];
    }
  }

  get totalCount(): number {
    return this.hours.reduce((acc, h) => acc + h.totalCount, 0);
  }

  get upperBoundSeconds(): number {
    return this.hours[0].range.highestTrackableValue;
  }
}

import type { ConfigError, DurationError, ParseError, SourceDecodeError } from './errors';
import type { HourlyHistogram } from './utils/hourlyHistogram';

export type Outcome<T, E> =
  | { type: 'SUCCESS'; value: T }
  | { type: 'ERROR'; error: E };

export const success = <T>(value: T): { type: 'SUCCESS'; value: T } => ({ type: 'SUCCESS', value });
export const failure = <E>(error: E): { type: 'ERROR'; error: E } => ({ type: 'ERROR', error });

export interface TripRecord {
  readonly row: number;         // 1-based data row in the source
  readonly pickupTime: string;  // YYYY-MM-DD HH:MM:SS
  readonly dropoffTime: string; // YYYY-MM-DD HH:MM:SS
  readonly pickupZone: number;
  readonly dropoffZone: number;
}

export type TripOutcome = Outcome<TripRecord, SourceDecodeError>;

// Workbooks decode from memory; CSV files stream
export type TripSource = Iterable<TripOutcome> | AsyncIterable<TripOutcome>;

export interface RunningCounts {
  read: number;
  matched: number; // Passed the zone and weekday gates
  skipped: number; // Matched, but the duration was rejected
}

export interface HistogramSettings {
  lowerBoundSeconds: number;
  upperBoundSeconds: number;
  significantDigits: number;
}

export interface RecordedDuration {
  hour: number;     // 0-23, pickup hour
  duration: number; // seconds
}

export interface TripAnalysis {
  counts: RunningCounts;
  histogram: HourlyHistogram;
}

export type FatalError = ConfigError | SourceDecodeError | ParseError;

export type DurationOutcome = Outcome<RecordedDuration, DurationError>;

export interface HourSummary {
  hour: number;
  count: number;
  mean: number;
  p50: number;
  p90: number;
  p99: number;
  max: number;
}

export interface TripColumnMap {
  pickupTime: number; // Column index in the sheet
  dropoffTime: number;
  pickupZone: number;
  dropoffZone: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface AppConfig {
  histogram: HistogramSettings;
  logLevel: LogLevel;
}

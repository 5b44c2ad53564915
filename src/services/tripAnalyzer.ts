import type { DurationError } from '../errors';
import {
  type FatalError,
  type HistogramSettings,
  type Outcome,
  type RunningCounts,
  type TripAnalysis,
  type TripRecord,
  type TripSource,
  success,
} from '../types';
import { openTripSource } from '../utils/csvProcessor';
import { HourlyHistogram } from '../utils/hourlyHistogram';
import { logger } from '../utils/logger';
import { parseTimestamp } from '../utils/timeParser';
import { isMidtownToJfk, isWeekday } from '../utils/tripClassifier';

export interface AnalyzeOptions {
  histogram?: Partial<HistogramSettings>;
  /** Receives one line per skipped record. Defaults to a logger warning. */
  onSkip?: (message: string) => void;
}

export const describeSkip = (record: TripRecord, error: DurationError): string =>
  `Skipping record #${record.row} (${error.message}; pickup ${record.pickupTime}, dropoff ${record.dropoffTime}, ` +
  `zones ${record.pickupZone} -> ${record.dropoffZone})`;

/**
 * Single pass over the trip source. Decode and timestamp failures end the
 * run; a rejected duration only bumps `skipped`.
 */
export const analyzeTrips = async (
  source: TripSource,
  options: AnalyzeOptions = {}
): Promise<Outcome<TripAnalysis, FatalError>> => {
  const onSkip = options.onSkip ?? ((message: string) => logger.warn(message));
  const counts: RunningCounts = { read: 0, matched: 0, skipped: 0 };

  const created = HourlyHistogram.create(
    options.histogram?.lowerBoundSeconds,
    options.histogram?.upperBoundSeconds,
    options.histogram?.significantDigits
  );
  if (created.type === 'ERROR') return created;
  const histogram = created.value;

  for await (const item of source) {
    if (item.type === 'ERROR') return item;
    const record = item.value;
    counts.read++;

    // 1. Zones
    if (!isMidtownToJfk(record)) continue;

    // 2. Weekday of pickup
    const pickup = parseTimestamp(record.pickupTime);
    if (pickup.type === 'ERROR') return pickup;
    if (!isWeekday(pickup.value)) continue;
    counts.matched++;

    // 3. Duration
    const dropoff = parseTimestamp(record.dropoffTime);
    if (dropoff.type === 'ERROR') return dropoff;

    const recorded = histogram.recordDuration(pickup.value, dropoff.value);
    if (recorded.type === 'ERROR') {
      counts.skipped++;
      onSkip(describeSkip(record, recorded.error));
    }
  }

  return success({ counts, histogram });
};

/** Streams a CSV file, or loads a workbook, and runs `analyzeTrips` over its rows. */
export const analyzeTripFile = (path: string, options: AnalyzeOptions = {}): Promise<Outcome<TripAnalysis, FatalError>> => {
  logger.debug(`Reading trips from ${path}`);
  return analyzeTrips(openTripSource(path), options);
};

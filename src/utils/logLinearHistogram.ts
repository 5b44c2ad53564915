/**
 * Log-linear (HDR-style) histogram for bounded positive integers.
 *
 * Values below `2 * 10^digits` (rounded up to a power of two) get one bucket
 * each. Above that, every power-of-two band is split into the same number of
 * linear sub-buckets, so any two values sharing a bucket differ by less than
 * one part in `10^digits`.
 */

import { ConfigError } from '../errors';
import { type Outcome, failure, success } from '../types';

export interface HistogramRange {
  lowestDiscernibleValue: number;
  highestTrackableValue: number;
  significantDigits: number;
}

export interface RecordedBucket {
  lowestValue: number;
  highestValue: number;
  count: number;
}

// Bucket arithmetic runs on 32-bit integers
const MAX_TRACKABLE_VALUE = 2 ** 31 - 1;
const MIN_DIGITS = 1;
const MAX_DIGITS = 5;

export class LogLinearHistogram {
  private readonly counts: Float64Array;
  private readonly unitMagnitude: number;
  private readonly subBucketHalfCountMagnitude: number;
  private readonly subBucketHalfCount: number;
  private _totalCount = 0;
  private _minValue = Number.MAX_SAFE_INTEGER;
  private _maxValue = 0;

  private constructor(readonly range: Readonly<HistogramRange>) {
    const { lowestDiscernibleValue, highestTrackableValue, significantDigits } = range;

    const largestValueWithSingleUnitResolution = 2 * 10 ** significantDigits;
    const subBucketCountMagnitude = Math.ceil(Math.log2(largestValueWithSingleUnitResolution));
    this.unitMagnitude = Math.floor(Math.log2(lowestDiscernibleValue));
    this.subBucketHalfCountMagnitude = Math.max(subBucketCountMagnitude, 1) - 1;

    const subBucketCount = 2 ** (this.subBucketHalfCountMagnitude + 1);
    this.subBucketHalfCount = subBucketCount / 2;

    let smallestUntrackableValue = subBucketCount * 2 ** this.unitMagnitude;
    let bucketCount = 1;
    while (smallestUntrackableValue <= highestTrackableValue) {
      smallestUntrackableValue *= 2;
      bucketCount++;
    }

    this.counts = new Float64Array((bucketCount + 1) * this.subBucketHalfCount);
  }

  static create(range: HistogramRange): Outcome<LogLinearHistogram, ConfigError> {
    const { lowestDiscernibleValue: lowest, highestTrackableValue: highest, significantDigits: digits } = range;

    if (!Number.isInteger(lowest) || !Number.isInteger(highest) || !Number.isInteger(digits)) {
      return failure(new ConfigError('Histogram bounds and precision must be integers'));
    }
    if (lowest < 1) {
      return failure(new ConfigError(`Lowest discernible value must be >= 1, got ${lowest}`));
    }
    if (highest < 2 * lowest) {
      return failure(new ConfigError(`Highest trackable value ${highest} must be at least twice the lowest (${lowest})`));
    }
    if (highest > MAX_TRACKABLE_VALUE) {
      return failure(new ConfigError(`Highest trackable value must be <= ${MAX_TRACKABLE_VALUE}, got ${highest}`));
    }
    if (digits < MIN_DIGITS || digits > MAX_DIGITS) {
      return failure(new ConfigError(`Significant digits must be in ${MIN_DIGITS}..${MAX_DIGITS}, got ${digits}`));
    }

    return success(new LogLinearHistogram(Object.freeze({ ...range })));
  }

  get totalCount(): number {
    return this._totalCount;
  }

  /** Returns false, leaving the histogram untouched, when the value is out of range. */
  record(value: number): boolean {
    if (!this.isTrackable(value)) return false;

    this.counts[this.countsIndexFor(value)]++;
    this._totalCount++;
    if (value < this._minValue) this._minValue = value;
    if (value > this._maxValue) this._maxValue = value;
    return true;
  }

  isTrackable(value: number): boolean {
    return Number.isInteger(value)
      && value >= this.range.lowestDiscernibleValue
      && value <= this.range.highestTrackableValue;
  }

  countAtValue(value: number): number {
    if (!this.isTrackable(value)) return 0;
    return this.counts[this.countsIndexFor(value)];
  }

  get min(): number {
    return this._totalCount === 0 ? 0 : this.lowestEquivalentValue(this._minValue);
  }

  get max(): number {
    return this._totalCount === 0 ? 0 : this.highestEquivalentValue(this._maxValue);
  }

  /** Mean of bucket midpoints. 0 if no data. */
  get mean(): number {
    if (this._totalCount === 0) return 0;
    let total = 0;
    for (const bucket of this.recordedValues()) {
      total += this.medianEquivalentValue(bucket.lowestValue) * bucket.count;
    }
    return total / this._totalCount;
  }

  /** Highest value equivalent to the one at percentile `p` (0-100). 0 if no data. */
  valueAtPercentile(p: number): number {
    if (this._totalCount === 0) return 0;
    const percentile = Math.min(Math.max(p, 0), 100);
    const target = Math.max(1, Math.floor((percentile / 100) * this._totalCount + 0.5));

    let cumulative = 0;
    for (let i = 0; i < this.counts.length; i++) {
      cumulative += this.counts[i];
      if (cumulative >= target) {
        return this.highestEquivalentValue(this.valueFromIndex(i));
      }
    }
    return 0;
  }

  lowestEquivalentValue(value: number): number {
    const bucketIndex = this.bucketIndexOf(value);
    const subBucketIndex = this.subBucketIndexOf(value, bucketIndex);
    return subBucketIndex * 2 ** (bucketIndex + this.unitMagnitude);
  }

  highestEquivalentValue(value: number): number {
    return this.lowestEquivalentValue(value) + this.sizeOfEquivalentRange(value) - 1;
  }

  medianEquivalentValue(value: number): number {
    return this.lowestEquivalentValue(value) + Math.floor(this.sizeOfEquivalentRange(value) / 2);
  }

  *recordedValues(): Generator<RecordedBucket> {
    for (let i = 0; i < this.counts.length; i++) {
      const count = this.counts[i];
      if (count === 0) continue;
      const lowestValue = this.valueFromIndex(i);
      yield { lowestValue, highestValue: this.highestEquivalentValue(lowestValue), count };
    }
  }

  /** Adds every count of a histogram with the same range into this one. */
  add(other: LogLinearHistogram): void {
    const { lowestDiscernibleValue, highestTrackableValue, significantDigits } = this.range;
    if (other.range.lowestDiscernibleValue !== lowestDiscernibleValue
      || other.range.highestTrackableValue !== highestTrackableValue
      || other.range.significantDigits !== significantDigits) {
      throw new RangeError('Cannot merge histograms with different ranges');
    }
    if (other._totalCount === 0) return;

    for (let i = 0; i < this.counts.length; i++) {
      this.counts[i] += other.counts[i];
    }
    this._totalCount += other._totalCount;
    this._minValue = Math.min(this._minValue, other._minValue);
    this._maxValue = Math.max(this._maxValue, other._maxValue);
  }

  reset(): void {
    this.counts.fill(0);
    this._totalCount = 0;
    this._minValue = Number.MAX_SAFE_INTEGER;
    this._maxValue = 0;
  }

  private sizeOfEquivalentRange(value: number): number {
    return 2 ** (this.unitMagnitude + this.bucketIndexOf(value));
  }

  // Values below the first power-of-two boundary all land in bucket 0
  private bucketIndexOf(value: number): number {
    const bitLength = 32 - Math.clz32(value);
    return Math.max(0, bitLength - this.unitMagnitude - (this.subBucketHalfCountMagnitude + 1));
  }

  private subBucketIndexOf(value: number, bucketIndex: number): number {
    return Math.floor(value / 2 ** (bucketIndex + this.unitMagnitude));
  }

  private countsIndexFor(value: number): number {
    const bucketIndex = this.bucketIndexOf(value);
    const subBucketIndex = this.subBucketIndexOf(value, bucketIndex);
    return (bucketIndex + 1) * this.subBucketHalfCount + (subBucketIndex - this.subBucketHalfCount);
  }

  private valueFromIndex(index: number): number {
    let bucketIndex = Math.floor(index / this.subBucketHalfCount) - 1;
    let subBucketIndex = (index % this.subBucketHalfCount) + this.subBucketHalfCount;
    if (bucketIndex < 0) {
      subBucketIndex -= this.subBucketHalfCount;
      bucketIndex = 0;
    }
    return subBucketIndex * 2 ** (bucketIndex + this.unitMagnitude);
  }
}

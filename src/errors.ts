export class TripAnalyzerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid histogram bounds or precision, or an unusable environment setting. */
export class ConfigError extends TripAnalyzerError {}

/** A source row (or the source itself) could not be turned into a trip record. */
export class SourceDecodeError extends TripAnalyzerError {
  constructor(message: string, readonly row?: number) {
    super(row === undefined ? message : `Row ${row}: ${message}`);
  }
}

export class ParseError extends TripAnalyzerError {
  constructor(readonly text: string, reason: string) {
    super(`Invalid timestamp "${text}": ${reason}`);
  }
}

export type DurationErrorKind = 'TOO_SHORT' | 'TOO_LONG' | 'NEGATIVE';

export class DurationError extends TripAnalyzerError {
  constructor(readonly kind: DurationErrorKind, readonly duration: number) {
    super(DurationError.describe(kind, duration));
  }

  private static describe(kind: DurationErrorKind, duration: number): string {
    switch (kind) {
      case 'TOO_SHORT':
        return `Duration too short: ${duration}s`;
      case 'TOO_LONG':
        return `Duration too long: ${duration}s`;
      case 'NEGATIVE':
        return `Dropoff precedes pickup by ${-duration}s`;
    }
  }
}

import type { TripRecord } from '../types';
import type { ParsedTime } from './timeParser';

// Kept sorted: isMidtownPickup binary-searches it
export const MIDTOWN_ZONES: readonly number[] = Object.freeze([90, 100, 161, 162, 163, 164, 186, 230, 234]);

export const JFK_ZONE = 132;

export const isMidtownPickup = (zone: number): boolean => {
  let lo = 0;
  let hi = MIDTOWN_ZONES.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >>> 1;
    const candidate = MIDTOWN_ZONES[mid];
    if (candidate === zone) return true;
    if (candidate < zone) lo = mid + 1;
    else hi = mid - 1;
  }
  return false;
};

export const isJfkDropoff = (zone: number): boolean => zone === JFK_ZONE;

export const isWeekday = (time: ParsedTime): boolean => time.weekday >= 1 && time.weekday <= 5;

/** Zone gate; checked before any timestamp is parsed. */
export const isMidtownToJfk = (record: Pick<TripRecord, 'pickupZone' | 'dropoffZone'>): boolean =>
  isMidtownPickup(record.pickupZone) && isJfkDropoff(record.dropoffZone);

import type { TimeRange } from './timeRange';

/**
 * Returns the entries of `current` that have no exact counterpart (same start
 * and same end) in `previous`, in the order of `current`. A range that grew or
 * shrank since the previous run is reported as new.
 */
export function diffAvailability(current: TimeRange[], previous: TimeRange[]): TimeRange[] {
  const known = new Set(previous.map((range) => range.key()));
  return current.filter((range) => !known.has(range.key()));
}

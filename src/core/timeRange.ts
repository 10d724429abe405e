import { differenceInHours, differenceInMinutes } from 'date-fns';

/**
 * Half-open interval `[start, end)` between two absolute instants.
 * Instances are immutable; operations that change a bound return a new range.
 */
export class TimeRange {
  readonly start: Date;
  readonly end: Date;

  constructor(start: Date, end: Date) {
    if (!(start.getTime() < end.getTime())) {
      throw new RangeError(`Invalid time range: ${printable(start)} – ${printable(end)}`);
    }
    this.start = new Date(start.getTime());
    this.end = new Date(end.getTime());
  }

  /**
   * Like the constructor, but returns `null` for an empty, inverted or
   * unparseable interval.
   */
  static tryCreate(start: Date, end: Date): TimeRange | null {
    if (!(start.getTime() < end.getTime())) {
      return null;
    }
    return new TimeRange(start, end);
  }

  static compare(a: TimeRange, b: TimeRange): number {
    return a.start.getTime() - b.start.getTime() || a.end.getTime() - b.end.getTime();
  }

  get durationMinutes(): number {
    return differenceInMinutes(this.end, this.start);
  }

  get durationHours(): number {
    return differenceInHours(this.end, this.start);
  }

  containsInstant(instant: Date): boolean {
    const time = instant.getTime();
    return time >= this.start.getTime() && time < this.end.getTime();
  }

  equals(other: TimeRange): boolean {
    return this.key() === other.key();
  }

  extendTo(end: Date): TimeRange {
    return new TimeRange(this.start, end);
  }

  /** Identity of the instant pair, for set lookups. */
  key(): string {
    return `${this.start.getTime()}/${this.end.getTime()}`;
  }
}

function printable(date: Date): string {
  return Number.isNaN(date.getTime()) ? 'Invalid Date' : date.toISOString();
}

import { z } from 'zod';
import { TimeRange } from '../core/timeRange';
import type {
  AvailabilitySource,
  OpeningWindow,
  ReservationWindow,
  SourceSettings,
  SourceWindows,
} from '../types';
import { calendarDateOf, lookaheadWindow, parseInstant } from '../utils/time';
import { executeWithRetry } from '../utils/retry';
import { PerfLogger } from '../utils/perfLogger';

const offsetTimestamp = z.string().datetime({ offset: true });

const openingHoursSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  opens: offsetTimestamp.nullable().optional(),
  closes: offsetTimestamp.nullable().optional(),
});

const reservationSchema = z.object({
  begin: offsetTimestamp,
  end: offsetTimestamp,
});

const resourceSchema = z.object({
  opening_hours: z.array(openingHoursSchema),
  reservations: z.array(reservationSchema).nullish(),
});

type FetchFn = typeof fetch;

export class RespaSourceClient implements AvailabilitySource {
  constructor(
    private readonly settings: SourceSettings,
    private readonly fetchFn: FetchFn = fetch,
    private readonly retryDelayMs = 1000
  ) {}

  buildUrl(now: Date): string {
    const { start, end } = lookaheadWindow(now, this.settings.lookaheadDays);
    const params = new URLSearchParams({
      start: start.toISOString(),
      end: end.toISOString(),
      format: 'json',
    });
    return `${this.settings.apiUrl}/resource/${encodeURIComponent(this.settings.resourceId)}/?${params.toString()}`;
  }

  async fetchWindows(now: Date): Promise<SourceWindows> {
    const url = this.buildUrl(now);
    const body = await PerfLogger.measure('SOURCE: fetch', () =>
      executeWithRetry(() => this.request(url), {
        attempts: this.settings.attempts,
        initialDelayMs: this.retryDelayMs,
        onRetry: (attempt, error, nextDelayMs) => {
          console.warn(
            `⚠️ Availability request failed (attempt ${attempt}/${this.settings.attempts}), retrying in ${nextDelayMs}ms:`,
            error
          );
        },
      })
    );
    return parseResourcePayload(body);
  }

  private async request(url: string): Promise<unknown> {
    const response = await this.fetchFn(url, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(this.settings.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Availability source responded with ${response.status} ${response.statusText}`);
    }
    return response.json();
  }
}

/**
 * Validates a resource response and turns it into dated windows.
 * Closed dates (no `opens`/`closes`) and windows that do not end after they
 * start are left out.
 */
export function parseResourcePayload(body: unknown): SourceWindows {
  const parsed = resourceSchema.safeParse(body);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Unexpected response from availability source: ${details}`);
  }

  const openings: OpeningWindow[] = [];
  for (const day of parsed.data.opening_hours) {
    if (!day.opens || !day.closes) {
      continue;
    }
    const range = TimeRange.tryCreate(parseInstant(day.opens), parseInstant(day.closes));
    if (!range) {
      console.warn(`⚠️ Skipping opening hours for ${day.date}: ${day.opens} – ${day.closes}`);
      continue;
    }
    openings.push({ date: day.date, range });
  }

  const reservations: ReservationWindow[] = [];
  for (const reservation of parsed.data.reservations ?? []) {
    const range = TimeRange.tryCreate(parseInstant(reservation.begin), parseInstant(reservation.end));
    if (!range) {
      console.warn(`⚠️ Skipping reservation ${reservation.begin} – ${reservation.end}`);
      continue;
    }
    reservations.push({ date: calendarDateOf(reservation.begin), range });
  }

  return { openings, reservations };
}

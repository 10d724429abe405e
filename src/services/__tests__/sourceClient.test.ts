import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RespaSourceClient, parseResourcePayload } from '../sourceClient';
import type { SourceSettings } from '../../types';

const settings: SourceSettings = {
  apiUrl: 'https://respa.test/v1',
  resourceId: 'test-resource',
  lookaheadDays: 14,
  timeoutMs: 1000,
  attempts: 2,
};

const payload = {
  id: 'test-resource',
  opening_hours: [
    { date: '2023-12-01', opens: '2023-12-01T10:00:00+02:00', closes: '2023-12-01T14:00:00+02:00' },
    { date: '2023-12-02', opens: '2023-12-02T16:00:00+02:00', closes: '2023-12-02T19:00:00+02:00' },
    { date: '2023-12-03', opens: null, closes: null },
  ],
  reservations: [
    { begin: '2023-12-01T10:00:00+02:00', end: '2023-12-01T11:00:00+02:00', state: 'confirmed' },
    { begin: '2023-12-01T11:00:00+02:00', end: '2023-12-01T14:00:00+02:00' },
  ],
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('parseResourcePayload', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('turns opening hours and reservations into dated windows', () => {
    const { openings, reservations } = parseResourcePayload(payload);

    expect(openings.map((o) => [o.date, o.range.start.toISOString(), o.range.end.toISOString()])).toEqual([
      ['2023-12-01', '2023-12-01T08:00:00.000Z', '2023-12-01T12:00:00.000Z'],
      ['2023-12-02', '2023-12-02T14:00:00.000Z', '2023-12-02T17:00:00.000Z'],
    ]);
    expect(reservations.map((r) => [r.date, r.range.start.toISOString(), r.range.end.toISOString()])).toEqual([
      ['2023-12-01', '2023-12-01T08:00:00.000Z', '2023-12-01T09:00:00.000Z'],
      ['2023-12-01', '2023-12-01T09:00:00.000Z', '2023-12-01T12:00:00.000Z'],
    ]);
  });

  it('tags a reservation with the date written in its begin timestamp', () => {
    const { reservations } = parseResourcePayload({
      opening_hours: [],
      reservations: [{ begin: '2023-12-01T23:00:00+02:00', end: '2023-12-02T01:00:00+02:00' }],
    });
    expect(reservations[0].date).toBe('2023-12-01');
  });

  it('treats a date with only one of opens/closes as closed', () => {
    const { openings } = parseResourcePayload({
      opening_hours: [{ date: '2023-12-04', opens: '2023-12-04T10:00:00+02:00', closes: null }],
    });
    expect(openings).toEqual([]);
  });

  it('accepts a response without reservations', () => {
    expect(parseResourcePayload({ opening_hours: [], reservations: null }).reservations).toEqual([]);
    expect(parseResourcePayload({ opening_hours: [] }).reservations).toEqual([]);
  });

  it('drops windows that do not end after they start', () => {
    const { openings, reservations } = parseResourcePayload({
      opening_hours: [{ date: '2023-12-01', opens: '2023-12-01T14:00:00+02:00', closes: '2023-12-01T10:00:00+02:00' }],
      reservations: [{ begin: '2023-12-01T11:00:00+02:00', end: '2023-12-01T11:00:00+02:00' }],
    });
    expect(openings).toEqual([]);
    expect(reservations).toEqual([]);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('rejects timestamps without an offset', () => {
    expect(() =>
      parseResourcePayload({
        opening_hours: [{ date: '2023-12-01', opens: 'tomorrow', closes: '2023-12-01T14:00:00+02:00' }],
      })
    ).toThrow(/^Unexpected response from availability source: opening_hours\.0\.opens/);
  });

  it('rejects a body without opening hours', () => {
    expect(() => parseResourcePayload({ detail: 'Not found.' })).toThrow(
      'Unexpected response from availability source: opening_hours: Required'
    );
  });
});

describe('RespaSourceClient', () => {
  const now = new Date('2023-12-01T06:30:00.000Z');

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('requests the look-ahead window as JSON', () => {
    const client = new RespaSourceClient(settings);
    expect(client.buildUrl(now)).toBe(
      'https://respa.test/v1/resource/test-resource/?start=2023-12-01T06%3A30%3A00.000Z&end=2023-12-15T06%3A30%3A00.000Z&format=json'
    );
  });

  it('fetches and parses the resource', async () => {
    const fetchFn = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => jsonResponse(payload));
    const client = new RespaSourceClient(settings, fetchFn, 0);

    const windows = await client.fetchWindows(now);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0][0]).toBe(client.buildUrl(now));
    expect(windows.openings).toHaveLength(2);
    expect(windows.reservations).toHaveLength(2);
  });

  it('retries a failed request', async () => {
    const fetchFn = vi
      .fn(async (_url: string | URL | Request, _init?: RequestInit) => jsonResponse(payload))
      .mockImplementationOnce(async () => jsonResponse({ detail: 'busy' }, 503));
    const client = new RespaSourceClient(settings, fetchFn, 0);

    const windows = await client.fetchWindows(now);

    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(windows.openings).toHaveLength(2);
  });

  it('gives up after the configured number of attempts', async () => {
    const fetchFn = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => {
      throw new TypeError('fetch failed');
    });
    const client = new RespaSourceClient(settings, fetchFn, 0);

    await expect(client.fetchWindows(now)).rejects.toThrow('fetch failed');
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('reports the status of a rejected request', async () => {
    const fetchFn = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({ detail: 'Not found.' }, 404)
    );
    const client = new RespaSourceClient({ ...settings, attempts: 1 }, fetchFn, 0);

    await expect(client.fetchWindows(now)).rejects.toThrow('Availability source responded with 404');
  });
});

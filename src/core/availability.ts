import { addHours, isEqual } from 'date-fns';
import { TimeRange } from './timeRange';
import type { OpeningWindow, ReservationWindow } from '../types';

/**
 * Розбиває вікно роботи на погодинні слоти і відкидає зайняті.
 *
 * A slot counts as reserved when its start instant falls inside a reservation
 * of the same calendar date. A trailing part shorter than one hour is dropped.
 */
export function hourlyCandidates(
  opening: OpeningWindow,
  reservations: ReservationWindow[]
): TimeRange[] {
  const sameDay = reservations.filter((r) => r.date === opening.date);
  const closesAt = opening.range.end.getTime();
  const slots: TimeRange[] = [];

  let slotStart = opening.range.start;
  let slotEnd = addHours(slotStart, 1);

  while (slotEnd.getTime() <= closesAt) {
    const candidate = new TimeRange(slotStart, slotEnd);
    const reserved = sameDay.some((r) => r.range.containsInstant(candidate.start));
    if (!reserved) {
      slots.push(candidate);
    }
    slotStart = slotEnd;
    slotEnd = addHours(slotStart, 1);
  }

  return slots;
}

/**
 * Joins slots where one ends exactly when the next begins.
 */
export function mergeContiguous(slots: TimeRange[]): TimeRange[] {
  const merged: TimeRange[] = [];
  let current: TimeRange | null = null;

  for (const slot of slots) {
    if (current && isEqual(current.end, slot.start)) {
      current = current.extendTo(slot.end);
      continue;
    }
    if (current) {
      merged.push(current);
    }
    current = slot;
  }

  if (current) {
    merged.push(current);
  }
  return merged;
}

export function computeAvailability(
  openings: OpeningWindow[],
  reservations: ReservationWindow[]
): TimeRange[] {
  const ordered = [...openings].sort((a, b) => TimeRange.compare(a.range, b.range));
  const free = ordered.flatMap((opening) => hourlyCandidates(opening, reservations));
  return mergeContiguous(free);
}

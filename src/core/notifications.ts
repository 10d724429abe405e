import type { TimeRange } from './timeRange';
import { formatDateISO, formatTime } from '../utils/time';

export const TELEGRAM_MESSAGE_LIMIT = 4096;

const HEADER = 'New available times:';

// 2023-12-01 10:00-14:00 (4h)
export function formatAvailabilityLine(range: TimeRange, tz: string): string {
  const date = formatDateISO(range.start, tz);
  const start = formatTime(range.start, tz);
  const end = formatTime(range.end, tz);
  return `${date} ${start}-${end} (${range.durationHours}h)`;
}

/**
 * Builds the message texts announcing `ranges`, one line per range. Lines are
 * never split; when the list does not fit into one message, the rest goes
 * into follow-up messages that repeat the header.
 */
export function buildAvailabilityMessages(
  ranges: TimeRange[],
  tz: string,
  maxLength = TELEGRAM_MESSAGE_LIMIT
): string[] {
  const messages: string[] = [];
  let current = HEADER;

  for (const range of ranges) {
    const line = formatAvailabilityLine(range, tz);
    if (current !== HEADER && current.length + 1 + line.length > maxLength) {
      messages.push(current);
      current = HEADER;
    }
    current += `\n${line}`;
  }

  if (current !== HEADER) {
    messages.push(current);
  }
  return messages;
}

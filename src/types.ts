import type { TimeRange } from './core/timeRange';

export interface DatedWindow {
  date: string; // yyyy-MM-dd
  range: TimeRange;
}

// Періоди, коли об'єкт відкритий
export type OpeningWindow = DatedWindow;
// Вже заброньований час
export type ReservationWindow = DatedWindow;

export interface SourceWindows {
  openings: OpeningWindow[];
  reservations: ReservationWindow[];
}

export interface SourceSettings {
  apiUrl: string;
  resourceId: string;
  lookaheadDays: number;
  timeoutMs: number;
  attempts: number;
}

export interface TelegramSettings {
  botToken: string;
  chatId: string;
}

export interface AppConfig {
  telegram: TelegramSettings;
  source: SourceSettings;
  pollIntervalMs: number;
  storageFile: string;
  timeZone: string;
}

export interface AvailabilitySource {
  fetchWindows(now: Date): Promise<SourceWindows>;
}

export interface SnapshotRepository {
  load(): Promise<TimeRange[]>;
  save(ranges: TimeRange[]): Promise<void>;
}

export interface AvailabilityNotifier {
  notify(ranges: TimeRange[]): Promise<void>;
}

export interface CycleReport {
  availability: TimeRange[];
  fresh: TimeRange[];
  notified: boolean;
}

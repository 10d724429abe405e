import { computeAvailability } from '../core/availability';
import { diffAvailability } from '../core/snapshotDiff';
import type {
  AvailabilityNotifier,
  AvailabilitySource,
  CycleReport,
  SnapshotRepository,
} from '../types';
import { PerfLogger } from '../utils/perfLogger';

export class AvailabilityMonitor {
  constructor(
    private readonly source: AvailabilitySource,
    private readonly store: SnapshotRepository,
    private readonly notifier: AvailabilityNotifier
  ) {}

  /**
   * One fetch → compute → diff → persist → notify pass. Rejects without
   * touching the snapshot if fetching, computing or saving fails; a failed
   * notification is only logged, since the new state is already saved.
   */
  async runCycle(now = new Date()): Promise<CycleReport> {
    const end = PerfLogger.start('CYCLE');
    try {
      const previous = await this.store.load();
      const windows = await this.source.fetchWindows(now);
      const availability = computeAvailability(windows.openings, windows.reservations);
      const fresh = diffAvailability(availability, previous);

      await this.store.save(availability);
      console.log(
        `✅ ${availability.length} free range(s) from ${windows.openings.length} opening(s) and ${windows.reservations.length} reservation(s), ${fresh.length} new`
      );

      if (!fresh.length) {
        return { availability, fresh, notified: false };
      }

      try {
        await this.notifier.notify(fresh);
        return { availability, fresh, notified: true };
      } catch (error) {
        console.error('❌ Failed to send availability notification:', error);
        return { availability, fresh, notified: false };
      }
    } finally {
      end();
    }
  }

  /** Runs a single cycle and reports failure instead of rejecting. */
  async checkOnce(now = new Date()): Promise<boolean> {
    try {
      await this.runCycle(now);
      return true;
    } catch (error) {
      console.error('❌ Availability check failed:', error);
      return false;
    }
  }
}

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { TimeRange } from '../core/timeRange';
import type { SnapshotRepository } from '../types';
import { formatOffsetTimestamp, parseInstant } from '../utils/time';
import { PerfLogger } from '../utils/perfLogger';

const snapshotSchema = z.array(
  z.object({
    start: z.string().datetime({ offset: true }),
    end: z.string().datetime({ offset: true }),
  })
);

export type SnapshotRecord = z.infer<typeof snapshotSchema>[number];

export class SnapshotStore implements SnapshotRepository {
  constructor(
    private readonly filePath: string,
    private readonly timeZone: string
  ) {}

  async load(): Promise<TimeRange[]> {
    const end = PerfLogger.start('STORE: load');
    try {
      let raw: string;
      try {
        raw = await fs.readFile(this.filePath, 'utf8');
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
          return [];
        }
        throw error;
      }
      return this.decode(raw);
    } finally {
      end();
    }
  }

  async save(ranges: TimeRange[]): Promise<void> {
    const end = PerfLogger.start('STORE: save');
    try {
      const records: SnapshotRecord[] = ranges.map((range) => ({
        start: formatOffsetTimestamp(range.start, this.timeZone),
        end: formatOffsetTimestamp(range.end, this.timeZone),
      }));
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });

      // Пишемо у тимчасовий файл і підміняємо, щоб не лишити напівзаписаний знімок
      const tempPath = `${this.filePath}.${process.pid}.tmp`;
      try {
        await fs.writeFile(tempPath, JSON.stringify(records, null, 2), 'utf8');
        await fs.rename(tempPath, this.filePath);
      } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
      }
    } finally {
      end();
    }
  }

  private decode(raw: string): TimeRange[] {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      console.warn(`⚠️ Snapshot ${this.filePath} is not valid JSON, starting from an empty one:`, error);
      return [];
    }

    const parsed = snapshotSchema.safeParse(json);
    if (!parsed.success) {
      console.warn(`⚠️ Snapshot ${this.filePath} has an unexpected shape, starting from an empty one`);
      return [];
    }

    const ranges: TimeRange[] = [];
    for (const record of parsed.data) {
      const range = TimeRange.tryCreate(parseInstant(record.start), parseInstant(record.end));
      if (range) {
        ranges.push(range);
      }
    }
    return ranges;
  }
}

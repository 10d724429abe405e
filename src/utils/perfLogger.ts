import { performance } from 'node:perf_hooks';

export class PerfLogger {
  /**
   * Starts a timer; the returned callback logs and returns the elapsed time.
   */
  static start(label: string): () => number {
    const startedAt = performance.now();
    return () => {
      const elapsed = performance.now() - startedAt;
      console.log(`[PERF] ${label} took ${elapsed.toFixed(2)}ms`);
      return elapsed;
    };
  }

  static async measure<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const end = PerfLogger.start(label);
    try {
      return await fn();
    } finally {
      end();
    }
  }
}

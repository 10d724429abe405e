/**
 * Runs a task every `intervalMs`, counted from the start of the previous run.
 * Runs never overlap: a run that takes longer than the interval delays the
 * next one until it has finished. Failures are logged and do not stop the loop.
 */
export class PollingScheduler {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private active = false;
  private generation = 0;

  constructor(
    private readonly task: () => Promise<unknown>,
    private readonly intervalMs: number
  ) {}

  get isRunning(): boolean {
    return this.active;
  }

  start(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    const generation = ++this.generation;

    // Попередній запуск ще триває: перший тік стартує лише після нього
    const pending = this.inFlight;
    this.inFlight = pending ? pending.then(() => this.resume(generation)) : this.tick(generation);
  }

  async stop(): Promise<void> {
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private resume(generation: number): Promise<void> | undefined {
    if (this.active && generation === this.generation) {
      return this.tick(generation);
    }
    if (generation === this.generation) {
      this.inFlight = null;
    }
    return undefined;
  }

  private tick(generation: number): Promise<void> {
    this.timer = null;
    const startedAt = Date.now();
    return this.runOnce().then(() => {
      if (generation !== this.generation) {
        return;
      }
      this.inFlight = null;
      if (!this.active) {
        return;
      }
      const delay = Math.max(0, this.intervalMs - (Date.now() - startedAt));
      this.timer = setTimeout(() => {
        this.inFlight = this.tick(generation);
      }, delay);
    });
  }

  private async runOnce(): Promise<void> {
    try {
      await this.task();
    } catch (error) {
      console.error('❌ Availability check failed, retrying on the next tick:', error);
    }
  }
}

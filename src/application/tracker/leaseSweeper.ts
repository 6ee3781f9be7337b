import { describeError, logEvent } from "../../shared/logging/logEvent";

/**
 * Runs `sweep` every `intervalMs` until stopped. A tick that is still running when the
 * next one is due is not overlapped; that tick is skipped.
 */
export class LeaseSweeper {
  private timer?: NodeJS.Timeout;
  private running = false;

  constructor(
    private readonly sweep: () => Promise<number>,
    private readonly intervalMs: number
  ) {}

  start(): void {
    if (this.timer || this.intervalMs <= 0) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    // The sweeper alone never keeps the process alive.
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
  }

  isStarted(): boolean {
    return this.timer != null;
  }

  async tick(): Promise<number> {
    if (this.running) return 0;
    this.running = true;
    try {
      return await this.sweep();
    } catch (err) {
      // A failed tick is retried on the next interval.
      logEvent("warn", "tracker.sweep_failed", describeError(err));
      return 0;
    } finally {
      this.running = false;
    }
  }
}

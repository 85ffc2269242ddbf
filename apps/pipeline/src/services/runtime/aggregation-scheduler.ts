import type { KpiAggregationPort } from '@ride-pipeline/domain';
import { errorMessage } from '../../errors.js';

/** Runs the aggregator on a fixed interval. Runs never overlap. */
export class AggregationScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly aggregator: KpiAggregationPort,
    private readonly intervalMs: number,
  ) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    console.log(`[aggregator] scheduled every ${this.intervalMs}ms`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** One scheduled run; a failure is logged and the schedule carries on. */
  async tick(): Promise<void> {
    if (this.inFlight) {
      console.warn('[aggregator] previous run still in progress, skipping tick');
      return;
    }
    this.inFlight = this.aggregator.run();
    try {
      await this.inFlight;
    } catch (err) {
      console.error(`[aggregator] scheduled run failed: ${errorMessage(err)}`);
    } finally {
      this.inFlight = null;
    }
  }
}

import { describe, it, expect, afterEach, jest } from '@jest/globals';
import type { KpiAggregationPort } from '@ride-pipeline/domain';
import { AggregationScheduler } from '../services/runtime/aggregation-scheduler.js';

describe('AggregationScheduler', () => {
  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it('logs a failed run and keeps the schedule', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const run = jest
      .fn<KpiAggregationPort['run']>()
      .mockRejectedValueOnce(new Error('scan failed'))
      .mockResolvedValue(undefined);
    const scheduler = new AggregationScheduler({ run }, 60_000);

    await scheduler.tick();
    await scheduler.tick();

    expect(run).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenCalledWith('[aggregator] scheduled run failed: scan failed');
  });

  it('skips a tick while the previous run is still going', async () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    let finish: () => void = () => undefined;
    const run = jest.fn<KpiAggregationPort['run']>(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        }),
    );
    const scheduler = new AggregationScheduler({ run }, 60_000);

    const first = scheduler.tick();
    await scheduler.tick();
    finish();
    await first;

    expect(run).toHaveBeenCalledTimes(1);
  });

  it('runs on the configured interval', async () => {
    jest.useFakeTimers();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const run = jest.fn<KpiAggregationPort['run']>().mockResolvedValue(undefined);
    const scheduler = new AggregationScheduler({ run }, 60_000);

    scheduler.start();
    await jest.advanceTimersByTimeAsync(180_000);
    scheduler.stop();
    await jest.advanceTimersByTimeAsync(180_000);

    expect(run).toHaveBeenCalledTimes(3);
  });
});

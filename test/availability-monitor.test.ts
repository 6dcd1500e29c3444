import { describe, expect, it, vi } from 'vitest';
import { AvailabilityMonitor } from '../src/monitor/availability-monitor';
import { MetricsRecorder } from '../src/monitor/metrics';
import { CompositeNotifier, Notifier } from '../src/monitor/notifiers';
import { SlotFetchStrategy } from '../src/monitor/strategy';
import { CheckResult, SlotInfo, TargetWindow } from '../src/types';
import { FakeClock } from './helpers/fake-clock';
import { silentLogger } from './helpers/fixtures';

const window: TargetWindow = {
  date: '2025-08-10',
  desiredTime: { hour: 8, minute: 0 },
  windowStart: { hour: 7, minute: 0 },
  windowEnd: { hour: 10, minute: 0 },
  requiredCapacity: 2,
};

const listed: SlotInfo[] = [
  { timeOfDay: { hour: 6, minute: 30 }, capacity: 4, label: '6:30 AM' },
  { timeOfDay: { hour: 7, minute: 40 }, capacity: 3, label: '7:40 AM' },
  { timeOfDay: { hour: 8, minute: 20 }, capacity: 1, label: '8:20 AM' },
  { timeOfDay: { hour: 9, minute: 50 }, capacity: 2, label: '9:50 AM' },
];

function setup(strategy: Partial<SlotFetchStrategy> = {}, clock = new FakeClock(Date.UTC(2025, 7, 1, 15, 0))) {
  const notifier = { notify: vi.fn(async (_result: CheckResult) => undefined) } satisfies Notifier;
  const metrics = {
    recordMetric: vi.fn(async (_name: string, _value: number, _timestamp: Date) => undefined),
  } satisfies MetricsRecorder;
  const monitor = new AvailabilityMonitor({
    strategy: {
      name: 'fake',
      authenticate: async () => true,
      fetchSlots: async () => listed,
      ...strategy,
    },
    window,
    notifier,
    metrics,
    logger: silentLogger,
    clock,
  });
  return { monitor, notifier, metrics, clock };
}

describe('AvailabilityMonitor.checkOnce', () => {
  it('keeps only slots inside the window with room for the party', async () => {
    const { monitor } = setup();
    const result = await monitor.checkOnce();

    expect(result).toMatchObject({ success: true, date: '2025-08-10', total: 2, seen: 4, strategy: 'fake' });
    expect(result.slots.map((slot) => slot.label)).toEqual(['7:40 AM', '9:50 AM']);
    expect(result.timestamp.toISOString()).toBe('2025-08-01T15:00:00.000Z');
  });

  it('reports a failed login without fetching', async () => {
    const fetchSlots = vi.fn(async () => listed);
    const { monitor } = setup({ authenticate: async () => false, fetchSlots });

    await expect(monitor.checkOnce()).resolves.toMatchObject({
      success: false,
      total: 0,
      error: 'Authentication failed',
    });
    expect(fetchSlots).not.toHaveBeenCalled();
  });

  it('turns a fetch error into a failed result', async () => {
    const { monitor } = setup({
      fetchSlots: async () => {
        throw new Error('HTTP 503');
      },
    });
    await expect(monitor.checkOnce()).resolves.toMatchObject({ success: false, error: 'HTTP 503' });
  });
});

describe('AvailabilityMonitor.report', () => {
  it('records metrics and notifies when slots match', async () => {
    const { monitor, notifier, metrics } = setup();
    const result = await monitor.checkOnce();
    await monitor.report(result);

    expect(metrics.recordMetric.mock.calls).toEqual([
      ['AvailableSlots', 2, result.timestamp],
      ['CheckSuccess', 1, result.timestamp],
    ]);
    expect(notifier.notify).toHaveBeenCalledWith(result);
  });

  it('records metrics but stays quiet when nothing matches', async () => {
    const { monitor, notifier, metrics } = setup({ fetchSlots: async () => [listed[0]] });
    await monitor.report(await monitor.checkOnce());

    expect(metrics.recordMetric).toHaveBeenCalledWith('AvailableSlots', 0, expect.any(Date));
    expect(notifier.notify).not.toHaveBeenCalled();
  });

  it('records a failed check as CheckSuccess 0', async () => {
    const { monitor, notifier, metrics } = setup({ authenticate: async () => false });
    await monitor.report(await monitor.checkOnce());

    expect(metrics.recordMetric).toHaveBeenCalledWith('CheckSuccess', 0, expect.any(Date));
    expect(notifier.notify).not.toHaveBeenCalled();
  });

  it('swallows notifier and metrics failures', async () => {
    const { monitor, notifier, metrics } = setup();
    notifier.notify.mockRejectedValueOnce(new Error('disk full'));
    metrics.recordMetric.mockRejectedValueOnce(new Error('offline'));

    await expect(monitor.report(await monitor.checkOnce())).resolves.toBeUndefined();
  });
});

describe('AvailabilityMonitor.run', () => {
  it('sleeps the interval between checks and stops at maxChecks', async () => {
    const { monitor, clock } = setup();
    const checks = await monitor.run({ intervalMinutes: 15, maxChecks: 3 });

    expect(checks).toBe(3);
    expect(clock.sleeps).toEqual([900_000, 900_000]);
  });

  it('keeps polling after a failed check', async () => {
    const fetchSlots = vi
      .fn(async () => listed)
      .mockRejectedValueOnce(new Error('timeout'));
    const { monitor, notifier } = setup({ fetchSlots });

    await monitor.run({ intervalMinutes: 1, maxChecks: 2 });

    expect(fetchSlots).toHaveBeenCalledTimes(2);
    expect(notifier.notify).toHaveBeenCalledTimes(1);
  });

  it.each([0, -5, Number.NaN])('refuses an interval of %s minutes before checking', async (intervalMinutes) => {
    const fetchSlots = vi.fn(async () => listed);
    const { monitor, clock } = setup({ fetchSlots });

    await expect(monitor.run({ intervalMinutes, maxChecks: 4 })).rejects.toThrow(RangeError);
    expect(fetchSlots).not.toHaveBeenCalled();
    expect(clock.sleeps).toEqual([]);
  });

  it('stops when cancelled during the interval', async () => {
    const controller = new AbortController();
    const clock = new FakeClock(0, () => controller.abort());
    const { monitor } = setup({}, clock);

    await expect(monitor.run({ intervalMinutes: 5, signal: controller.signal })).resolves.toBe(1);
  });
});

describe('CompositeNotifier', () => {
  it('calls every notifier and then reports the failures', async () => {
    const failing = {
      notify: vi.fn(async (_result: CheckResult): Promise<void> => {
        throw new Error('smtp down');
      }),
    };
    const working = { notify: vi.fn(async (_result: CheckResult) => undefined) };
    const composite = new CompositeNotifier([failing, working], silentLogger);
    const { monitor } = setup();
    const result = await monitor.checkOnce();

    await expect(composite.notify(result)).rejects.toThrow('1 of 2 notifiers failed.');
    expect(working.notify).toHaveBeenCalledWith(result);
  });
});

import type { Logger } from 'pino';
import { CancelledError, Clock, systemClock } from '../engine/clock';
import { filterSlots } from '../engine/slot-selector';
import { CheckResult, TargetWindow } from '../types';
import { MetricsRecorder } from './metrics';
import { Notifier } from './notifiers';
import { SlotFetchStrategy } from './strategy';

export interface AvailabilityMonitorOptions {
  strategy: SlotFetchStrategy;
  window: TargetWindow;
  notifier: Notifier;
  metrics: MetricsRecorder;
  logger: Logger;
  clock?: Clock;
}

export interface MonitorRunOptions {
  intervalMinutes: number;
  signal?: AbortSignal;
  /** Stop after this many checks; unbounded when omitted. */
  maxChecks?: number;
}

/**
 * Periodically checks availability and reports it. Never claims a slot and
 * never waits on a release gate.
 */
export class AvailabilityMonitor {
  private readonly clock: Clock;

  constructor(private readonly options: AvailabilityMonitorOptions) {
    this.clock = options.clock ?? systemClock;
  }

  async checkOnce(): Promise<CheckResult> {
    const { strategy, window, logger } = this.options;
    const timestamp = new Date(this.clock.now());
    const failure = (error: string): CheckResult => ({
      success: false,
      date: window.date,
      slots: [],
      total: 0,
      seen: 0,
      timestamp,
      strategy: strategy.name,
      error,
    });

    try {
      if (!(await strategy.authenticate())) {
        return failure('Authentication failed');
      }
      const seen = await strategy.fetchSlots();
      const slots = filterSlots(seen, window);
      return {
        success: true,
        date: window.date,
        slots,
        total: slots.length,
        seen: seen.length,
        timestamp,
        strategy: strategy.name,
      };
    } catch (error) {
      logger.error({ err: error, strategy: strategy.name }, 'Availability check failed');
      return failure(error instanceof Error ? error.message : String(error));
    }
  }

  async report(result: CheckResult): Promise<void> {
    const { metrics, notifier, logger } = this.options;

    try {
      await metrics.recordMetric('AvailableSlots', result.total, result.timestamp);
      await metrics.recordMetric('CheckSuccess', result.success ? 1 : 0, result.timestamp);
    } catch (error) {
      logger.warn({ err: error }, 'Recording metrics failed');
    }

    if (!result.success || result.total === 0) {
      return;
    }
    try {
      await notifier.notify(result);
    } catch (error) {
      logger.warn({ err: error }, 'Notification failed');
    }
  }

  /** Resolves with the number of checks performed. */
  async run(options: MonitorRunOptions): Promise<number> {
    const { logger } = this.options;
    if (!Number.isFinite(options.intervalMinutes) || options.intervalMinutes <= 0) {
      throw new RangeError(
        `Monitor interval must be a positive number of minutes, got ${options.intervalMinutes}.`
      );
    }
    const intervalMs = options.intervalMinutes * 60_000;
    let checks = 0;

    logger.info({ intervalMinutes: options.intervalMinutes }, 'Monitor started');

    while (!options.signal?.aborted) {
      const result = await this.checkOnce();
      await this.report(result);
      checks += 1;
      logger.info(
        { check: checks, success: result.success, total: result.total, seen: result.seen },
        'Availability check complete'
      );

      if (options.maxChecks !== undefined && checks >= options.maxChecks) {
        break;
      }
      try {
        await this.clock.sleep(intervalMs, options.signal);
      } catch (error) {
        if (error instanceof CancelledError) {
          break;
        }
        throw error;
      }
    }

    logger.info({ checks }, 'Monitor stopped');
    return checks;
  }
}

import type { Logger } from 'pino';
import { formatTimeOfDay } from '../engine/time';
import { buildEnvelope, writeOutput } from '../output';
import { AppConfig, CheckResult } from '../types';

export interface Notifier {
  notify(result: CheckResult): Promise<void>;
}

export function describeCheck(result: CheckResult): string {
  const times = result.slots.map((slot) => `${formatTimeOfDay(slot.timeOfDay)} (${slot.capacity})`);
  return `${result.total} matching slot(s) on ${result.date}: ${times.join(', ')}`;
}

export class LogNotifier implements Notifier {
  constructor(private readonly logger: Logger) {}

  async notify(result: CheckResult): Promise<void> {
    this.logger.info(
      { date: result.date, total: result.total, strategy: result.strategy },
      describeCheck(result)
    );
  }
}

/** Leaves one JSON envelope per positive check under `<outputDir>/monitor/`. */
export class FileNotifier implements Notifier {
  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger
  ) {}

  async notify(result: CheckResult): Promise<void> {
    const envelope = buildEnvelope(this.config, {
      command: 'monitor',
      durationMs: 0,
      success: result.success,
      now: result.timestamp,
      data: {
        date: result.date,
        strategy: result.strategy,
        total: result.total,
        seen: result.seen,
        slots: result.slots.map((slot) => ({
          time: formatTimeOfDay(slot.timeOfDay),
          capacity: slot.capacity,
          label: slot.label,
        })),
      },
    });
    const outputPath = writeOutput(this.config, 'monitor', envelope, result.timestamp);
    this.logger.info({ outputPath }, 'Availability written');
  }
}

/** Calls every notifier, then fails if any of them did. */
export class CompositeNotifier implements Notifier {
  constructor(
    private readonly notifiers: Notifier[],
    private readonly logger: Logger
  ) {}

  async notify(result: CheckResult): Promise<void> {
    let failures = 0;
    for (const notifier of this.notifiers) {
      try {
        await notifier.notify(result);
      } catch (error) {
        failures += 1;
        this.logger.warn({ err: error, notifier: notifier.constructor.name }, 'Notifier failed');
      }
    }
    if (failures > 0) {
      throw new Error(`${failures} of ${this.notifiers.length} notifiers failed.`);
    }
  }
}

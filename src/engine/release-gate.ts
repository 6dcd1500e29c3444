import { DateTime } from 'luxon';
import type { Logger } from 'pino';
import { ReleaseInstant } from '../types';
import { Clock, systemClock, throwIfCancelled } from './clock';

const DEFAULT_POLL_MS = 100;
const PROGRESS_LOG_INTERVAL_MS = 60_000;

export interface ReleaseGateOptions {
  clock?: Clock;
  logger?: Logger;
  pollMs?: number;
  /** Release this many milliseconds ahead of the instant (used to log in early). */
  leadMs?: number;
  maxWaitMs?: number;
  signal?: AbortSignal;
}

export class ReleaseGateTimeoutError extends Error {
  constructor(public readonly waitedMs: number, public readonly remainingMs: number) {
    super(`Release gate gave up after ${waitedMs}ms with ${remainingMs}ms still to wait.`);
    this.name = 'ReleaseGateTimeoutError';
  }
}

/** Today's `hour:minute:00` in the release timezone, as epoch milliseconds. */
export function resolveReleaseInstant(release: ReleaseInstant, nowMs: number): number {
  const resolved = DateTime.fromMillis(nowMs, { zone: release.timezone }).set({
    hour: release.hour,
    minute: release.minute,
    second: 0,
    millisecond: 0,
  });

  if (!resolved.isValid) {
    throw new Error(`Cannot resolve release time in timezone "${release.timezone}".`);
  }

  return resolved.toMillis();
}

export async function waitForRelease(
  release: ReleaseInstant,
  options: ReleaseGateOptions = {}
): Promise<void> {
  const clock = options.clock ?? systemClock;
  const pollMs = Math.max(1, options.pollMs ?? DEFAULT_POLL_MS);
  const { logger, signal, maxWaitMs } = options;

  const start = clock.now();
  const target = resolveReleaseInstant(release, start) - (options.leadMs ?? 0);

  logger?.info(
    {
      timezone: release.timezone,
      target: DateTime.fromMillis(target, { zone: release.timezone }).toISO(),
      waitMs: Math.max(0, target - start),
    },
    'Waiting for release'
  );

  let lastProgressLog = start;

  for (;;) {
    throwIfCancelled(signal);

    const now = clock.now();
    const remaining = target - now;
    if (remaining <= 0) {
      logger?.info({ lateMs: -remaining }, 'Release gate open');
      return;
    }

    if (maxWaitMs !== undefined && now - start >= maxWaitMs) {
      throw new ReleaseGateTimeoutError(now - start, remaining);
    }

    if (now - lastProgressLog >= PROGRESS_LOG_INTERVAL_MS) {
      logger?.info({ remainingMs: remaining }, 'Still waiting for release');
      lastProgressLog = now;
    }

    await clock.sleep(Math.min(pollMs, remaining), signal);
  }
}

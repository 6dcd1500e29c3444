import type { Logger } from 'pino';
import { AttemptOutcome, LoopResult } from '../types';
import { CancelledError, Clock, systemClock } from './clock';

const DEFAULT_FLOOR_DELAY_MS = 50;

export type Attempt = (attemptNumber: number) => Promise<AttemptOutcome>;

export interface AcquisitionLoopOptions {
  maxDurationMs: number;
  /** Runs after every retryable outcome, before the next attempt. */
  recover?: () => Promise<void>;
  floorDelayMs?: number;
  clock?: Clock;
  logger?: Logger;
  signal?: AbortSignal;
}

export class FatalAcquisitionError extends Error {
  constructor(
    public readonly reason: string,
    public readonly attempts: number,
    public readonly elapsedMs: number,
    public readonly lastOutcome: AttemptOutcome
  ) {
    super(`Acquisition stopped after ${attempts} attempt(s) in ${elapsedMs}ms: ${reason}`);
    this.name = 'FatalAcquisitionError';
  }
}

export async function runAcquisitionLoop(
  attempt: Attempt,
  options: AcquisitionLoopOptions
): Promise<LoopResult> {
  const clock = options.clock ?? systemClock;
  const floorDelayMs = Math.max(0, options.floorDelayMs ?? DEFAULT_FLOOR_DELAY_MS);
  const { logger, signal, recover, maxDurationMs } = options;

  const start = clock.now();
  const elapsed = () => clock.now() - start;
  let attempts = 0;
  let lastOutcome: AttemptOutcome | undefined;

  const finish = (stopReason: LoopResult['stopReason']): LoopResult => ({
    reserved: stopReason === 'reserved',
    attempts,
    elapsedMs: elapsed(),
    stopReason,
    lastOutcome,
    slot: lastOutcome?.kind === 'success' ? lastOutcome.slot : undefined,
  });

  for (;;) {
    if (signal?.aborted) {
      logger?.warn({ attempts, elapsedMs: elapsed() }, 'Acquisition cancelled');
      return finish('cancelled');
    }

    if (attempts > 0 && elapsed() >= maxDurationMs) {
      logger?.info({ attempts, elapsedMs: elapsed() }, 'Acquisition budget exhausted');
      return finish('exhausted');
    }

    attempts += 1;
    const outcome = await attempt(attempts);
    lastOutcome = outcome;

    if (outcome.kind === 'success') {
      const stopReason = outcome.claimed ? 'reserved' : 'selected';
      logger?.info({ attempts, elapsedMs: elapsed(), slot: outcome.slot?.label }, 'Acquisition succeeded');
      return finish(stopReason);
    }

    if (outcome.kind === 'fatal') {
      throw new FatalAcquisitionError(outcome.reason, attempts, elapsed(), outcome);
    }

    logger?.debug({ attempt: attempts, reason: outcome.reason }, 'Attempt not successful; retrying');

    if (elapsed() >= maxDurationMs) {
      logger?.info({ attempts, elapsedMs: elapsed() }, 'Acquisition budget exhausted');
      return finish('exhausted');
    }

    if (recover) {
      try {
        await recover();
      } catch (error) {
        logger?.warn({ err: error, attempt: attempts }, 'Recovery action failed');
      }
    }

    try {
      await clock.sleep(floorDelayMs, signal);
    } catch (error) {
      if (!(error instanceof CancelledError)) {
        throw error;
      }
    }
  }
}

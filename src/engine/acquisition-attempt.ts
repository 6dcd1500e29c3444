import { AttemptOutcome, ClaimObservation, SiteContext, Slot } from '../types';
import type { BookingSite } from '../sites/site';
import { classifyOutcome, countsAsFailure } from './outcome-classifier';
import { selectSlot } from './slot-selector';
import { formatTimeOfDay } from './time';

export interface AcquisitionAttemptDeps {
  site: BookingSite;
  ctx: SiteContext;
  /** Without confirmation the attempt stops once a slot is chosen. */
  confirm: boolean;
  maxConsecutiveFailures: number;
}

function slotSummary(slot: Slot) {
  return {
    label: slot.label,
    time: formatTimeOfDay(slot.timeOfDay),
    capacity: slot.capacity,
  };
}

/**
 * Builds one acquisition cycle: authenticate if needed, open the listing,
 * fetch and select a slot, claim it, and classify what the page shows.
 * The returned function keeps its own consecutive-failure count.
 */
export function createAcquisitionAttempt(deps: AcquisitionAttemptDeps) {
  const { site, ctx, confirm, maxConsecutiveFailures } = deps;
  const { logger } = ctx;
  let consecutiveFailures = 0;

  async function observe(attemptNumber: number): Promise<{ observation: ClaimObservation; slot?: Slot }> {
    try {
      if (!(await site.isAuthenticated(ctx))) {
        logger.info({ site: site.name, attempt: attemptNumber }, 'Session missing; logging in');
        const ok = await site.login(ctx);
        if (!ok) {
          return { observation: { kind: 'auth-failed', reason: 'credentials rejected' } };
        }
      }

      await site.openListing(ctx);
      const slots = await site.fetchSlots(ctx);
      const slot = selectSlot(slots, ctx.window);
      logger.debug(
        { attempt: attemptNumber, listed: slots.length, selected: slot?.label },
        'Slots fetched'
      );

      if (!slot) {
        return { observation: { kind: 'no-slot', seen: slots.length } };
      }

      if (!confirm) {
        return { observation: { kind: 'confirmed', detail: 'selected only' }, slot };
      }

      logger.info({ attempt: attemptNumber, slot: slotSummary(slot) }, 'Claiming slot');
      await site.claim(ctx, slot);
      return { observation: await site.observe(ctx), slot };
    } catch (error) {
      return { observation: { kind: 'error', error } };
    }
  }

  return async (attemptNumber: number): Promise<AttemptOutcome> => {
    const { observation, slot } = await observe(attemptNumber);
    const outcome = classifyOutcome(observation, { consecutiveFailures, maxConsecutiveFailures });
    consecutiveFailures = countsAsFailure(observation) ? consecutiveFailures + 1 : 0;

    if (observation.kind === 'error') {
      logger.warn({ err: observation.error, attempt: attemptNumber }, 'Attempt raised an automation error');
    }
    logger.info(
      { attempt: attemptNumber, observation: observation.kind, outcome: outcome.kind },
      'Attempt classified'
    );

    if (outcome.kind === 'success') {
      return {
        ...outcome,
        claimed: confirm,
        slot: slot ? { timeOfDay: slot.timeOfDay, capacity: slot.capacity, label: slot.label } : undefined,
      };
    }
    return outcome;
  };
}

import { SlotInfo, TargetWindow } from '../types';
import { minutesOf } from './time';

export function slotInWindow(slot: SlotInfo, window: TargetWindow): boolean {
  const minutes = minutesOf(slot.timeOfDay);
  return (
    slot.capacity >= window.requiredCapacity &&
    minutes >= minutesOf(window.windowStart) &&
    minutes <= minutesOf(window.windowEnd)
  );
}

export function filterSlots<T extends SlotInfo>(slots: T[], window: TargetWindow): T[] {
  return slots.filter((slot) => slotInWindow(slot, window));
}

/**
 * Picks the slot closest to the desired time among those inside the window
 * with enough capacity. Equal distances go to the earlier time, then to the
 * first one listed.
 */
export function selectSlot<T extends SlotInfo>(slots: T[], window: TargetWindow): T | undefined {
  const desired = minutesOf(window.desiredTime);
  let best: T | undefined;
  let bestDistance = Number.POSITIVE_INFINITY;

  for (const slot of filterSlots(slots, window)) {
    const minutes = minutesOf(slot.timeOfDay);
    const distance = Math.abs(minutes - desired);
    if (
      distance < bestDistance ||
      (distance === bestDistance && best !== undefined && minutes < minutesOf(best.timeOfDay))
    ) {
      best = slot;
      bestDistance = distance;
    }
  }

  return best;
}

import { Clock, systemClock } from '../engine/clock';
import { PageAutomation } from '../page/automation';
import { ClaimObservation } from '../types';

const MARKER_POLL_MS = 250;
const SPOTS_PATTERN = /(\d+)\s*(?:spots?|players?|golfers?)/i;

export interface Marker<T> {
  selector: string;
  value: T;
}

/**
 * Polls for the first of several markers to appear. Markers are checked in
 * order on every pass, so list the decisive ones first.
 */
export async function waitForFirstMarker<T>(
  page: PageAutomation,
  markers: Marker<T>[],
  timeoutMs: number,
  clock: Clock = systemClock
): Promise<T | undefined> {
  const deadline = clock.now() + timeoutMs;

  for (;;) {
    for (const marker of markers) {
      if (await page.isPresent(marker.selector)) {
        return marker.value;
      }
    }

    const remaining = deadline - clock.now();
    if (remaining <= 0) {
      return undefined;
    }
    await clock.sleep(Math.min(MARKER_POLL_MS, remaining));
  }
}

export interface OutcomeMarkers {
  confirmed: string;
  transient: Marker<string>[];
}

/** Waits for a confirmation or a known transient marker after a claim. */
export async function observeClaim(
  page: PageAutomation,
  markers: OutcomeMarkers,
  timeoutMs: number
): Promise<ClaimObservation> {
  const found = await waitForFirstMarker<ClaimObservation>(
    page,
    [
      { selector: markers.confirmed, value: { kind: 'confirmed' } },
      ...markers.transient.map((marker) => ({
        selector: marker.selector,
        value: { kind: 'transient', marker: marker.value } satisfies ClaimObservation,
      })),
    ],
    timeoutMs
  );

  return found ?? { kind: 'unrecognized', url: page.currentUrl() };
}

/** Reads "3 spots" / "4 players" style counts, or returns the fallback. */
export function parseCapacity(text: string, fallback: number): number {
  const match = text.match(SPOTS_PATTERN);
  return match ? Number(match[1]) : fallback;
}

/** Quotes a value for use inside an XPath expression. */
export function xpathLiteral(value: string): string {
  if (!value.includes("'")) {
    return `'${value}'`;
  }
  if (!value.includes('"')) {
    return `"${value}"`;
  }
  return `concat('${value.split("'").join(`', "'", '`)}')`;
}

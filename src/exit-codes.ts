import { CancelledError } from './engine/clock';
import { StopReason } from './types';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_EXHAUSTED = 2;
export const EXIT_CANCELLED = 130;

export function exitCodeForStop(stopReason: StopReason): number {
  switch (stopReason) {
    case 'reserved':
    case 'selected':
      return EXIT_OK;
    case 'exhausted':
      return EXIT_EXHAUSTED;
    case 'cancelled':
      return EXIT_CANCELLED;
  }
}

export function exitCodeForError(error: unknown): number {
  return error instanceof CancelledError ? EXIT_CANCELLED : EXIT_FAILURE;
}

import { APIRequestContext, request } from 'playwright';
import type { Logger } from 'pino';
import { z } from 'zod';
import { extractTimeOfDay, formatTimeOfDay, parseTimeOfDay } from '../engine/time';
import { parseCapacity } from '../sites/markers';
import { toMonthDayYear } from '../sites/dates';
import { AppConfig, SlotInfo, TargetWindow } from '../types';
import { SlotFetchStrategy } from './strategy';

export const DEFAULT_CAPACITY = 4;

const TEXT_TIME_PATTERN = /\d{1,2}:\d{2}\s*(?:am|pm)?/gi;
const CSRF_PATTERN = /name=["']_token["'][^>]*value=["']([^"']*)["']/i;
const LOGGED_IN_TEXT = /logout|dashboard/i;

const availableTimeSchema = z.object({
  time: z.string(),
  available_spots: z.number().int().nonnegative().default(DEFAULT_CAPACITY),
});

const availabilitySchema = z.union([
  z.array(availableTimeSchema),
  z.object({ times: z.array(availableTimeSchema) }).transform((body) => body.times),
]);

function slotAt(text: string, capacity: number): SlotInfo | undefined {
  const timeOfDay = parseTimeOfDay(text) ?? extractTimeOfDay(text);
  if (!timeOfDay) {
    return undefined;
  }
  return { timeOfDay, capacity, label: formatTimeOfDay(timeOfDay) };
}

function parseJsonBody(body: string): SlotInfo[] {
  const parsed = availabilitySchema.safeParse(JSON.parse(body));
  if (!parsed.success) {
    throw new Error(`Unexpected availability payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const slots: SlotInfo[] = [];
  for (const entry of parsed.data) {
    const slot = slotAt(entry.time, entry.available_spots);
    if (slot) {
      slots.push(slot);
    }
  }
  return slots;
}

/**
 * Scans markup or plain text for `7:30 am` style times. The text between one
 * time and the next may carry a "3 spots" count; otherwise the default applies.
 */
function parseTextBody(body: string): SlotInfo[] {
  const text = body.replace(/<[^>]*>/g, ' ');
  const matches = [...text.matchAll(TEXT_TIME_PATTERN)];
  const slots: SlotInfo[] = [];

  matches.forEach((match, i) => {
    const start = (match.index ?? 0) + match[0].length;
    const next = matches[i + 1];
    const end = next?.index ?? text.length;
    const slot = slotAt(match[0], parseCapacity(text.slice(start, end), DEFAULT_CAPACITY));
    if (slot) {
      slots.push(slot);
    }
  });
  return slots;
}

export function parseAvailabilityBody(body: string, contentType: string): SlotInfo[] {
  const trimmed = body.trim();
  if (contentType.includes('json') || trimmed.startsWith('[') || trimmed.startsWith('{')) {
    return parseJsonBody(trimmed);
  }
  return parseTextBody(body);
}

/** Fills `{date}` (MM-DD-YYYY), `{isoDate}` and `{players}` in the availability URL. */
export function buildAvailabilityUrl(template: string, window: TargetWindow): string {
  return template
    .replace(/\{date\}/g, encodeURIComponent(toMonthDayYear(window.date)))
    .replace(/\{isoDate\}/g, encodeURIComponent(window.date))
    .replace(/\{players\}/g, String(window.requiredCapacity));
}

export interface HttpFetchStrategyOptions {
  config: AppConfig;
  window: TargetWindow;
  logger: Logger;
  /** Supplied by tests; otherwise a Playwright request context is created on first use. */
  api?: APIRequestContext;
}

/** Polls an availability endpoint without a browser. */
export class HttpFetchStrategy implements SlotFetchStrategy {
  readonly name = 'http';
  private api?: APIRequestContext;
  private readonly ownsApi: boolean;

  constructor(private readonly options: HttpFetchStrategyOptions) {
    this.api = options.api;
    this.ownsApi = options.api === undefined;
  }

  private async context(): Promise<APIRequestContext> {
    if (!this.api) {
      this.api = await request.newContext({ timeout: this.options.config.globalTimeout });
    }
    return this.api;
  }

  async authenticate(): Promise<boolean> {
    const { config, logger } = this.options;
    const loginUrl = config.monitor.loginUrl;
    if (!loginUrl) {
      return true;
    }

    const api = await this.context();
    const loginPage = await api.get(loginUrl);
    const csrf = (await loginPage.text()).match(CSRF_PATTERN)?.[1] ?? '';

    const response = await api.post(loginUrl, {
      form: {
        username: config.credentials.email,
        password: config.credentials.password,
        _token: csrf,
      },
    });
    const success = LOGGED_IN_TEXT.test(await response.text());
    logger.debug({ status: response.status(), success }, 'Monitor login response');
    return success;
  }

  async fetchSlots(): Promise<SlotInfo[]> {
    const { config, window, logger } = this.options;
    const url = buildAvailabilityUrl(config.monitor.apiUrl, window);
    const response = await (await this.context()).get(url);

    if (!response.ok()) {
      throw new Error(`Availability request failed with HTTP ${response.status()}.`);
    }

    const slots = parseAvailabilityBody(await response.text(), response.headers()['content-type'] ?? '');
    logger.debug({ url, count: slots.length }, 'Availability fetched');
    return slots;
  }

  async close(): Promise<void> {
    if (this.api && this.ownsApi) {
      await this.api.dispose();
      this.api = undefined;
    }
  }
}

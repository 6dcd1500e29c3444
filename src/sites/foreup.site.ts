import { extractTimeOfDay } from '../engine/time';
import { clickSelector, fillSelector, requireOne } from '../page/automation';
import { ClaimObservation, SiteContext, Slot } from '../types';
import { toMonthDayYear } from './dates';
import { observeClaim, parseCapacity, waitForFirstMarker } from './markers';
import { BookingSite } from './site';

const LOGIN_EMAIL = '#login_email';
const LOGIN_PASSWORD = '#login_password';
const LOGIN_SUBMIT = "[name='login_button']";
const LOGIN_ERROR = '.alert-danger, .login-error';
const RESERVATIONS_TAB = "a[href='#/teetimes']";
const BOOK_NOW = 'button.btn.btn-primary.col-md-4.col-xs-12.col-md-offset-4';
const DATE_FIELD = '#date-field';
const PLAYERS_FILTER = 'div.btn-group.btn-group-justified.hidden-xs.players';
const TIME_TILE = 'div.time.time-tile:not(.unavailable)';
const TIME_LABEL = 'div.booking-start-time-label';
const BOOKING_PLAYERS = "div.js-booking-field-buttons[data-field='players']";
const BOOK_TIME = 'button.btn.btn-success.js-book-button';
const CONFIRMATION = 'div.booking-confirmation';
const ERROR_MODAL = '.modal.in .alert-danger, .modal.in .error, .bootbox.modal';
const ERROR_ALERT = '.alert-danger';

const SESSION_CHECK_MS = 3000;
// Tiles render right after the filter is applied; an empty read means no slot yet.
export const LISTING_WAIT_MS = 500;

function playerOption(players: number): string {
  return `a[data-value='${players}']`;
}

/**
 * The reservations tab only renders for a signed-in member and the login form
 * only for a guest. With neither on the page the listing is assumed current.
 */
async function isAuthenticated(ctx: SiteContext): Promise<boolean> {
  const signedIn = await waitForFirstMarker(
    ctx.page,
    [
      { selector: RESERVATIONS_TAB, value: true },
      { selector: LOGIN_EMAIL, value: false },
    ],
    SESSION_CHECK_MS
  );
  return signedIn ?? true;
}

async function login(ctx: SiteContext): Promise<boolean> {
  const { page, config, logger } = ctx;

  await page.navigate(config.bookingUrl);
  await fillSelector(page, LOGIN_EMAIL, config.credentials.email, 'login email field');
  await fillSelector(page, LOGIN_PASSWORD, config.credentials.password, 'login password field');
  await clickSelector(page, LOGIN_SUBMIT, 'login button');

  const result = await waitForFirstMarker(
    page,
    [
      { selector: RESERVATIONS_TAB, value: true },
      { selector: LOGIN_ERROR, value: false },
    ],
    config.globalTimeout
  );

  if (result === undefined) {
    throw new Error('Login did not complete before timeout (no reservations tab or error shown).');
  }
  logger.info({ success: result }, 'ForeUp login finished');
  return result;
}

async function openListing(ctx: SiteContext): Promise<void> {
  const { page, window, logger } = ctx;

  const tab = await page.findOne(RESERVATIONS_TAB, undefined, LISTING_WAIT_MS);
  if (tab) {
    await page.click(tab);
  }

  await clickSelector(page, BOOK_NOW, 'book now button');

  const dateField = await requireOne(page, DATE_FIELD, 'date field');
  const dateText = toMonthDayYear(window.date);
  await page.fill(dateField, dateText);
  await page.press(dateField, 'Enter');
  logger.debug({ date: dateText }, 'Date selected');

  const filter = await requireOne(page, PLAYERS_FILTER, 'players filter');
  const option = await requireOne(
    page,
    playerOption(window.requiredCapacity),
    `${window.requiredCapacity}-player option`,
    filter
  );
  await page.click(option);
}

async function fetchSlots(ctx: SiteContext): Promise<Slot[]> {
  const { page, window, logger } = ctx;
  const tiles = await page.findAll(TIME_TILE, undefined, LISTING_WAIT_MS);
  const slots: Slot[] = [];

  for (const tile of tiles) {
    const labelRef = await page.findOne(TIME_LABEL, tile, 0);
    const label = labelRef ? await page.textOf(labelRef) : await page.textOf(tile);
    const timeOfDay = extractTimeOfDay(label);
    if (!timeOfDay) {
      logger.debug({ label }, 'Skipping tile without a readable time');
      continue;
    }

    // The listing is already filtered by party size, so a tile without a
    // spots count has room for at least the requested players.
    const capacity = parseCapacity(await page.textOf(tile), window.requiredCapacity);
    slots.push({ timeOfDay, capacity, label, domRef: tile });
  }

  return slots;
}

async function claim(ctx: SiteContext, slot: Slot): Promise<void> {
  const { page, window } = ctx;

  await page.click(slot.domRef);

  const fields = await requireOne(page, BOOKING_PLAYERS, 'booking players field');
  const option = await requireOne(
    page,
    playerOption(window.requiredCapacity),
    `${window.requiredCapacity}-player booking option`,
    fields
  );
  await page.click(option);
  await clickSelector(page, BOOK_TIME, 'book time button');
}

async function observe(ctx: SiteContext): Promise<ClaimObservation> {
  return observeClaim(
    ctx.page,
    {
      confirmed: CONFIRMATION,
      transient: [
        { selector: ERROR_MODAL, value: 'error dialog' },
        { selector: ERROR_ALERT, value: 'error alert' },
      ],
    },
    ctx.config.globalTimeout
  );
}

export const foreupSite: BookingSite = {
  name: 'foreup',
  description: 'ForeUp golf course tee times',
  resource: 'tee-time',
  isAuthenticated,
  login,
  openListing,
  fetchSlots,
  claim,
  observe,
  recover: (ctx) => ctx.page.reload(),
};

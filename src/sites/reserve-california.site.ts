import { START_OF_DAY } from '../engine/time';
import { clickSelector, fillSelector } from '../page/automation';
import { ClaimObservation, SiteContext, Slot } from '../types';
import { addDays, ordinalDateLabel } from './dates';
import { observeClaim, waitForFirstMarker, xpathLiteral } from './markers';
import { BookingSite, requireResourceName } from './site';

const LOGIN_BUTTON = '#login-btn';
const LOGIN_EMAIL = '#txtEmail';
const LOGIN_PASSWORD = '#txtPassword';
const LOGIN_SUBMIT = '#divOnlyLogin';
const LOGIN_ERROR = '.validation-summary-errors, .login-error';
const LOGGED_IN = '#logout-btn, a[href*="logout" i]';
const DATE_PICKER = '#custom-datepicker-calendar';
const REFRESH_BUTTON = "button.icons[title='Refresh']";
const CHECKOUT_BUTTON = '#checkout-button';
const SHOPPING_CART = "#shopping-cart, .shopping-cart, a[href*='ShoppingCart' i].active";
const ERROR_DIALOG = '.modal.show .modal-body, .toast-error';

const SESSION_CHECK_MS = 3000;
const REFRESH_WAIT_MS = 500;

function dayCell(isoDate: string): string {
  return `div[aria-label*='${ordinalDateLabel(isoDate)}']`;
}

function campsiteButton(resourceName: string): string {
  return `xpath=//td[contains(text(), ${xpathLiteral(resourceName)})]/../td[3]//button`;
}

/**
 * The picker's first click marks the night before the target date and the
 * second the departure day; without END_DATE the stay is one night.
 */
export function stayCells(date: string, endDate: string): { first: string; last: string } {
  return {
    first: dayCell(addDays(date, -1)),
    last: dayCell(endDate || addDays(date, 1)),
  };
}

async function login(ctx: SiteContext): Promise<boolean> {
  const { page, config, logger } = ctx;

  await page.navigate(config.bookingUrl);
  await clickSelector(page, LOGIN_BUTTON, 'login button');
  await fillSelector(page, LOGIN_EMAIL, config.credentials.email, 'email field');
  await fillSelector(page, LOGIN_PASSWORD, config.credentials.password, 'password field');
  await clickSelector(page, LOGIN_SUBMIT, 'login submit');

  const result = await waitForFirstMarker(
    page,
    [
      { selector: LOGGED_IN, value: true },
      { selector: LOGIN_ERROR, value: false },
    ],
    config.globalTimeout
  );
  if (result === undefined) {
    throw new Error('Login did not complete before timeout (no logout link or error shown).');
  }
  logger.info({ success: result }, 'ReserveCalifornia login finished');
  return result;
}

async function openListing(ctx: SiteContext): Promise<void> {
  const { page, config, window } = ctx;
  const cells = stayCells(window.date, config.target.endDate);

  await page.navigate(config.bookingUrl);
  await clickSelector(page, DATE_PICKER, 'date picker');
  await clickSelector(page, cells.first, 'first stay date');
  await clickSelector(page, cells.last, 'last stay date');
}

async function fetchSlots(ctx: SiteContext): Promise<Slot[]> {
  const { page, config, window } = ctx;
  const resourceName = config.target.resourceName;
  const button = await page.findOne(campsiteButton(resourceName));
  if (!button) {
    return [];
  }

  const disabled = (await page.attributeOf(button, 'disabled')) !== undefined;
  return [
    {
      timeOfDay: START_OF_DAY,
      capacity: disabled ? 0 : window.requiredCapacity,
      label: `${resourceName} ${window.date}`,
      domRef: button,
    },
  ];
}

/** Selecting the campsite only offers checkout; the hold is placed once checkout is clicked. */
async function claim(ctx: SiteContext, slot: Slot): Promise<void> {
  await ctx.page.click(slot.domRef);
  await clickSelector(ctx.page, CHECKOUT_BUTTON, 'checkout button');
}

async function observe(ctx: SiteContext): Promise<ClaimObservation> {
  return observeClaim(
    ctx.page,
    {
      confirmed: SHOPPING_CART,
      transient: [{ selector: ERROR_DIALOG, value: 'error dialog' }],
    },
    ctx.config.globalTimeout
  );
}

async function recover(ctx: SiteContext): Promise<void> {
  const refresh = await ctx.page.findOne(REFRESH_BUTTON, undefined, REFRESH_WAIT_MS);
  if (refresh) {
    ctx.logger.debug('Campsite not clickable; refreshing the grid');
    await ctx.page.click(refresh);
    return;
  }
  await ctx.page.reload();
}

export const reserveCaliforniaSite: BookingSite = {
  name: 'reserve-california',
  description: 'ReserveCalifornia state park campsites',
  resource: 'campsite',
  validate: requireResourceName,
  isAuthenticated: (ctx) => ctx.page.isPresent(LOGGED_IN, SESSION_CHECK_MS),
  login,
  openListing,
  fetchSlots,
  claim,
  observe,
  recover,
};

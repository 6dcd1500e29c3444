import { START_OF_DAY } from '../engine/time';
import { clickSelector, fillSelector, requireOne } from '../page/automation';
import { ClaimObservation, SiteContext, Slot } from '../types';
import { dateParts } from './dates';
import { observeClaim, waitForFirstMarker, xpathLiteral } from './markers';
import { BookingSite, requireResourceName } from './site';

const HOME_URL = 'https://www.recreation.gov';
const LOGIN_LINK = '#ga-global-nav-log-in-link';
const LOGIN_EMAIL = '#email';
const LOGIN_PASSWORD = '#rec-acct-sign-in-password';
const LOGIN_SUBMIT = 'button.rec-acct-sign-in-btn';
const LOGIN_ERROR = '.sarsa-alert.error, .rec-acct-sign-in-form [role="alert"]';
const LOGGED_IN = '#ga-global-nav-account-menu, button[aria-label*="account" i]';
const MONTH_SPIN = 'div[role="spinbutton"][aria-label="month, "]';
const GUEST_COUNTER = '#guest-counter';
const GUEST_PEOPLE = '#guest-counter-number-field-People';
const CLOSE_BUTTON = "xpath=//button[.//span[text()='Close']]";
const BOOK_NOW = "xpath=//button[.//span[text()='Book Now']]";
const ORDER_DETAILS = "xpath=//h1[text()='Order Details']";
const ERROR_MODAL = "xpath=//div[contains(@class, 'modal')]";
const DISABLED_CLASS = 'sarsa-button-disabled';

const SESSION_CHECK_MS = 3000;

function availabilityButtons(resourceName: string): string {
  return (
    `xpath=//button[.//span[text()=${xpathLiteral(resourceName)}]]` +
    "/ancestor::div[@role='gridcell']/following-sibling::div" +
    "//button[contains(@class, 'rec-availability-date')]"
  );
}

async function login(ctx: SiteContext): Promise<boolean> {
  const { page, config, logger } = ctx;

  await page.navigate(HOME_URL);
  await clickSelector(page, LOGIN_LINK, 'log in link');
  await fillSelector(page, LOGIN_EMAIL, config.credentials.email, 'email field');
  await fillSelector(page, LOGIN_PASSWORD, config.credentials.password, 'password field');
  await clickSelector(page, LOGIN_SUBMIT, 'sign in button');

  const result = await waitForFirstMarker(
    page,
    [
      { selector: LOGGED_IN, value: true },
      { selector: LOGIN_ERROR, value: false },
    ],
    config.globalTimeout
  );
  if (result === undefined) {
    throw new Error('Login did not complete before timeout (no account menu or error shown).');
  }
  logger.info({ success: result }, 'Recreation.gov login finished');
  return result;
}

/** The date input is three segmented spinbuttons that advance as digits are typed. */
export function spinbuttonDigits(isoDate: string): string {
  const { month, day, year } = dateParts(isoDate);
  return `${String(month).padStart(2, '0')}${String(day).padStart(2, '0')}${year}`;
}

async function openListing(ctx: SiteContext): Promise<void> {
  const { page, config, window } = ctx;

  await page.navigate(config.bookingUrl);

  const spin = await requireOne(page, MONTH_SPIN, 'date spinbutton');
  await page.click(spin);
  for (const digit of spinbuttonDigits(window.date)) {
    await page.press(spin, digit);
  }

  await clickSelector(page, GUEST_COUNTER, 'group size control');
  await fillSelector(page, GUEST_PEOPLE, String(window.requiredCapacity), 'people field');
  await clickSelector(page, CLOSE_BUTTON, 'group size close button');
}

async function fetchSlots(ctx: SiteContext): Promise<Slot[]> {
  const { page, config } = ctx;
  const resourceName = config.target.resourceName;
  const buttons = await page.findAll(availabilityButtons(resourceName));
  const first = buttons[0];
  if (!first) {
    return [];
  }

  const classes = (await page.attributeOf(first, 'class')) ?? '';
  const bookable = !classes.split(/\s+/).includes(DISABLED_CLASS);

  return [
    {
      timeOfDay: START_OF_DAY,
      capacity: bookable ? ctx.window.requiredCapacity : 0,
      label: `${resourceName} ${ctx.window.date}`,
      domRef: first,
    },
  ];
}

async function claim(ctx: SiteContext, slot: Slot): Promise<void> {
  await ctx.page.click(slot.domRef);
  await clickSelector(ctx.page, BOOK_NOW, 'book now button');
}

async function observe(ctx: SiteContext): Promise<ClaimObservation> {
  return observeClaim(
    ctx.page,
    {
      confirmed: ORDER_DETAILS,
      transient: [{ selector: ERROR_MODAL, value: 'error dialog' }],
    },
    ctx.config.globalTimeout
  );
}

export const recreationGovSite: BookingSite = {
  name: 'recreation-gov',
  description: 'Recreation.gov campgrounds and permits',
  resource: 'campsite',
  validate: requireResourceName,
  isAuthenticated: (ctx) => ctx.page.isPresent(LOGGED_IN, SESSION_CHECK_MS),
  login,
  openListing,
  fetchSlots,
  claim,
  observe,
  recover: (ctx) => ctx.page.reload(),
};

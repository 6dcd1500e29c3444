import { describe, expect, it } from 'vitest';
import { foreupSite, LISTING_WAIT_MS } from '../src/sites/foreup.site';
import { FakePage } from './helpers/fake-page';
import { makeConfig, makeSiteContext } from './helpers/fixtures';

const TIME_TILE = 'div.time.time-tile:not(.unavailable)';

describe('ForeUp', () => {
  it('reads an empty tee sheet after the short listing wait', async () => {
    const page = new FakePage();
    const slots = await foreupSite.fetchSlots(makeSiteContext(page, makeConfig()));

    expect(slots).toEqual([]);
    expect(page.lookups).toEqual([{ selector: TIME_TILE, timeoutMs: LISTING_WAIT_MS }]);
    expect(LISTING_WAIT_MS).toBe(500);
  });

  it('looks for the reservations tab without the full timeout', async () => {
    const page = new FakePage()
      .set('button.btn.btn-primary.col-md-4.col-xs-12.col-md-offset-4', {})
      .set('#date-field', {})
      .set('div.btn-group.btn-group-justified.hidden-xs.players', {
        children: { "a[data-value='2']": [{}] },
      });

    await foreupSite.openListing(makeSiteContext(page, makeConfig()));

    expect(page.lookups[0]).toEqual({ selector: "a[href='#/teetimes']", timeoutMs: LISTING_WAIT_MS });
    expect(page.actions[0]).toBe('click button.btn.btn-primary.col-md-4.col-xs-12.col-md-offset-4[0]');
  });

  it('treats the reservations tab as a live session', async () => {
    const page = new FakePage().set("a[href='#/teetimes']", {});
    await expect(foreupSite.isAuthenticated(makeSiteContext(page, makeConfig()))).resolves.toBe(true);
  });

  it('treats the login form as a signed-out session', async () => {
    const page = new FakePage().set('#login_email', {});
    await expect(foreupSite.isAuthenticated(makeSiteContext(page, makeConfig()))).resolves.toBe(false);
  });
});

import { describe, expect, it, vi } from 'vitest';
import { createAcquisitionAttempt } from '../src/engine/acquisition-attempt';
import { childRef } from '../src/page/automation';
import { foreupSite } from '../src/sites/foreup.site';
import { BookingSite } from '../src/sites/site';
import { Slot } from '../src/types';
import { FakePage } from './helpers/fake-page';
import { makeConfig, makeSiteContext } from './helpers/fixtures';

function slot(hour: number, minute: number, capacity: number): Slot {
  return {
    timeOfDay: { hour, minute },
    capacity,
    label: `${hour}:${String(minute).padStart(2, '0')}`,
    domRef: childRef(undefined, '.tile', hour),
  };
}

function fakeSite(overrides: Partial<BookingSite> = {}): BookingSite {
  return {
    name: 'fake',
    description: 'Scripted site',
    resource: 'tee-time',
    isAuthenticated: vi.fn(async () => true),
    login: vi.fn(async () => true),
    openListing: vi.fn(async () => undefined),
    fetchSlots: vi.fn(async () => [slot(7, 30, 4), slot(8, 10, 2)]),
    claim: vi.fn(async () => undefined),
    observe: vi.fn(async () => ({ kind: 'confirmed' as const })),
    recover: vi.fn(async () => undefined),
    ...overrides,
  };
}

describe('createAcquisitionAttempt', () => {
  it('claims the best slot and reports it without the page handle', async () => {
    const site = fakeSite();
    const attempt = createAcquisitionAttempt({
      site,
      ctx: makeSiteContext(new FakePage()),
      confirm: true,
      maxConsecutiveFailures: 5,
    });

    await expect(attempt(1)).resolves.toEqual({
      kind: 'success',
      claimed: true,
      slot: { timeOfDay: { hour: 8, minute: 10 }, capacity: 2, label: '8:10' },
    });
    expect(site.claim).toHaveBeenCalledWith(expect.anything(), expect.objectContaining({ label: '8:10' }));
    expect(site.login).not.toHaveBeenCalled();
  });

  it('stops at selection when not confirmed', async () => {
    const site = fakeSite();
    const attempt = createAcquisitionAttempt({
      site,
      ctx: makeSiteContext(new FakePage()),
      confirm: false,
      maxConsecutiveFailures: 5,
    });

    await expect(attempt(1)).resolves.toMatchObject({ kind: 'success', claimed: false });
    expect(site.claim).not.toHaveBeenCalled();
    expect(site.observe).not.toHaveBeenCalled();
  });

  it('logs in when the session is gone and fails fatally on rejected credentials', async () => {
    const site = fakeSite({
      isAuthenticated: vi.fn(async () => false),
      login: vi.fn(async () => false),
    });
    const attempt = createAcquisitionAttempt({
      site,
      ctx: makeSiteContext(new FakePage()),
      confirm: true,
      maxConsecutiveFailures: 5,
    });

    await expect(attempt(1)).resolves.toEqual({
      kind: 'fatal',
      reason: 'authentication failed: credentials rejected',
    });
    expect(site.openListing).not.toHaveBeenCalled();
  });

  it('retries when no slot matches', async () => {
    const site = fakeSite({ fetchSlots: vi.fn(async () => [slot(11, 0, 4)]) });
    const attempt = createAcquisitionAttempt({
      site,
      ctx: makeSiteContext(new FakePage()),
      confirm: true,
      maxConsecutiveFailures: 5,
    });

    await expect(attempt(1)).resolves.toEqual({
      kind: 'retryable',
      reason: 'no matching slot yet (1 listed)',
    });
  });

  it('turns repeated automation errors fatal at the cap', async () => {
    const site = fakeSite({
      fetchSlots: vi.fn(async (): Promise<Slot[]> => {
        throw new Error('frame detached');
      }),
    });
    const attempt = createAcquisitionAttempt({
      site,
      ctx: makeSiteContext(new FakePage()),
      confirm: true,
      maxConsecutiveFailures: 1,
    });

    await expect(attempt(1)).resolves.toEqual({ kind: 'retryable', reason: 'automation error: frame detached' });
    await expect(attempt(2)).resolves.toEqual({
      kind: 'fatal',
      reason: 'automation error: frame detached; 2 consecutive failures (limit 1)',
    });
  });

  it('resets the failure count after a clean observation', async () => {
    const fetchSlots = vi
      .fn(async (): Promise<Slot[]> => [])
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce([])
      .mockRejectedValueOnce(new Error('timeout'));
    const attempt = createAcquisitionAttempt({
      site: fakeSite({ fetchSlots }),
      ctx: makeSiteContext(new FakePage()),
      confirm: true,
      maxConsecutiveFailures: 1,
    });

    expect((await attempt(1)).kind).toBe('retryable');
    expect((await attempt(2)).kind).toBe('retryable');
    expect((await attempt(3)).kind).toBe('retryable');
  });

  it('runs a full ForeUp cycle against an in-memory page', async () => {
    const page = new FakePage();
    const tile = (label: string, spots: string) => ({
      text: `${label} ${spots}`,
      children: { 'div.booking-start-time-label': [{ text: label }] },
    });
    page
      .set("a[href='#/teetimes']", {})
      .set('button.btn.btn-primary.col-md-4.col-xs-12.col-md-offset-4', {})
      .set('#date-field', {})
      .set('div.btn-group.btn-group-justified.hidden-xs.players', {
        children: { "a[data-value='2']": [{}] },
      })
      .set(
        'div.time.time-tile:not(.unavailable)',
        tile('7:30am', '4 spots'),
        tile('8:10am', '2 spots'),
        tile('9:00am', '1 spot')
      )
      .set("div.js-booking-field-buttons[data-field='players']", {
        children: { "a[data-value='2']": [{}] },
      })
      .set('button.btn.btn-success.js-book-button', {
        onClick: () => page.set('div.booking-confirmation', { text: 'Reservation confirmed' }),
      });

    const attempt = createAcquisitionAttempt({
      site: foreupSite,
      ctx: makeSiteContext(page, makeConfig({ globalTimeout: 0 })),
      confirm: true,
      maxConsecutiveFailures: 5,
    });

    await expect(attempt(1)).resolves.toEqual({
      kind: 'success',
      claimed: true,
      slot: { timeOfDay: { hour: 8, minute: 10 }, capacity: 2, label: '8:10am' },
    });
    expect(page.actions).toEqual([
      "click a[href='#/teetimes'][0]",
      'click button.btn.btn-primary.col-md-4.col-xs-12.col-md-offset-4[0]',
      'fill #date-field[0] 08-10-2025',
      'press #date-field[0] Enter',
      "click div.btn-group.btn-group-justified.hidden-xs.players[0] >> a[data-value='2'][0]",
      'click div.time.time-tile:not(.unavailable)[1]',
      "click div.js-booking-field-buttons[data-field='players'][0] >> a[data-value='2'][0]",
      'click button.btn.btn-success.js-book-button[0]',
    ]);
  });
});

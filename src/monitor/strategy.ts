import type { BookingSite } from '../sites/site';
import { SiteContext, SlotInfo } from '../types';

/** Where a monitor check gets its slot list from. */
export interface SlotFetchStrategy {
  readonly name: string;
  authenticate(): Promise<boolean>;
  fetchSlots(): Promise<SlotInfo[]>;
  close?(): Promise<void>;
}

/** Drives the booking site in a real browser page, the same way a race does. */
export class DomFetchStrategy implements SlotFetchStrategy {
  readonly name = 'dom';

  constructor(
    private readonly site: BookingSite,
    private readonly ctx: SiteContext
  ) {}

  async authenticate(): Promise<boolean> {
    await this.ctx.page.navigate(this.ctx.config.bookingUrl);
    if (await this.site.isAuthenticated(this.ctx)) {
      return true;
    }
    return this.site.login(this.ctx);
  }

  async fetchSlots(): Promise<SlotInfo[]> {
    await this.site.openListing(this.ctx);
    const slots = await this.site.fetchSlots(this.ctx);
    return slots.map(({ timeOfDay, capacity, label }) => ({ timeOfDay, capacity, label }));
  }
}

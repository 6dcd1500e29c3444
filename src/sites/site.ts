import type { ConfigValidationError } from '../config';
import { AppConfig, ClaimObservation, SiteContext, Slot } from '../types';

export type ResourceKind = 'tee-time' | 'campsite';

/**
 * Page-specific knowledge of one booking website, expressed through the
 * page automation interface. The engine never touches selectors directly.
 */
export interface BookingSite {
  name: string;
  description: string;
  resource: ResourceKind;
  /** Site-specific configuration checks, on top of `validateConfig`. */
  validate?: (config: AppConfig) => ConfigValidationError[];
  isAuthenticated(ctx: SiteContext): Promise<boolean>;
  /** Resolves false when the site rejects the credentials. */
  login(ctx: SiteContext): Promise<boolean>;
  openListing(ctx: SiteContext): Promise<void>;
  fetchSlots(ctx: SiteContext): Promise<Slot[]>;
  claim(ctx: SiteContext, slot: Slot): Promise<void>;
  observe(ctx: SiteContext): Promise<ClaimObservation>;
  recover(ctx: SiteContext): Promise<void>;
}

export class AuthenticationError extends Error {
  constructor(site: string) {
    super(`The ${site} site rejected the configured credentials.`);
    this.name = 'AuthenticationError';
  }
}

export function requireResourceName(config: AppConfig): ConfigValidationError[] {
  if (config.target.resourceName) {
    return [];
  }
  return [
    {
      field: 'RESOURCE_NAME',
      message: 'RESOURCE_NAME (campsite, loop or trailhead label) is required for this site.',
    },
  ];
}

import fs from 'fs';
import path from 'path';
import { BrowserContext } from 'playwright';
import type { Logger } from 'pino';
import { AppConfig, SiteContext } from './types';
import type { BookingSite } from './sites/site';

export function sessionStateExists(config: AppConfig): boolean {
  return fs.existsSync(config.sessionStatePath);
}

export function ensureSessionStateDir(config: AppConfig): void {
  const dir = path.dirname(config.sessionStatePath);
  fs.mkdirSync(dir, { recursive: true });
}

export function deleteSessionState(config: AppConfig): void {
  if (fs.existsSync(config.sessionStatePath)) {
    fs.rmSync(config.sessionStatePath);
  }
}

export async function saveSessionState(
  context: BrowserContext,
  config: AppConfig,
  logger?: Logger
): Promise<void> {
  ensureSessionStateDir(config);
  await context.storageState({ path: config.sessionStatePath });
  logger?.debug({ path: config.sessionStatePath }, 'Session state saved');
}

/**
 * Opens the booking site with the stored session and asks the site whether
 * it still recognizes the member. A stale state file is removed.
 */
export async function validateSession(site: BookingSite, ctx: SiteContext): Promise<boolean> {
  await ctx.page.navigate(ctx.config.bookingUrl);
  const valid = await site.isAuthenticated(ctx);
  ctx.logger.debug({ site: site.name, valid }, 'Session validation check');

  if (!valid) {
    deleteSessionState(ctx.config);
  }
  return valid;
}

import { FlowContext, FlowDefinition, SiteContext } from '../types';
import { AuthenticationError, BookingSite } from './site';

export interface PrepareHooks {
  /** Called after a fresh login, e.g. to persist the browser session. */
  onLogin?: () => Promise<void>;
}

function requireSite(ctx: FlowContext): SiteContext {
  if (!ctx.site) {
    throw new Error('FlowContext.site is required for this step.');
  }
  return ctx.site;
}

/** Steps run before the release instant so the race starts on a warm page. */
export function buildPrepareFlow(site: BookingSite, hooks: PrepareHooks = {}): FlowDefinition {
  return {
    name: `${site.name}-prepare`,
    description: `Log in to ${site.description} and open the listing`,
    steps: [
      {
        name: 'open-site',
        description: 'Open the booking page with the saved session, if any.',
        action: async (ctx) => {
          const siteCtx = requireSite(ctx);
          await siteCtx.page.navigate(siteCtx.config.bookingUrl);
        },
      },
      {
        name: 'login',
        description: 'Log in unless the saved session is still accepted.',
        action: async (ctx) => {
          const siteCtx = requireSite(ctx);
          if (await site.isAuthenticated(siteCtx)) {
            ctx.logger.info({ site: site.name }, 'Saved session accepted');
            return;
          }
          if (!(await site.login(siteCtx))) {
            throw new AuthenticationError(site.name);
          }
          await hooks.onLogin?.();
        },
      },
      {
        name: 'open-listing',
        description: `Open the ${site.resource} listing for the target date.`,
        action: async (ctx) => {
          await site.openListing(requireSite(ctx));
        },
      },
    ],
  };
}

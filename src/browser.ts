import fs from 'fs';
import { chromium, Browser, BrowserContext, Page } from 'playwright';
import type { Logger } from 'pino';
import { AppConfig } from './types';
import { PlaywrightPageAutomation } from './page/playwright-automation';

export interface BrowserSession {
  browser: Browser;
  context: BrowserContext;
  page: Page;
  automation: PlaywrightPageAutomation;
  close: () => Promise<void>;
}

export async function launchBrowser(config: AppConfig, logger?: Logger): Promise<BrowserSession> {
  const browser = await chromium.launch({
    headless: config.headless,
    slowMo: config.slowMo,
  });

  const storageState = fs.existsSync(config.sessionStatePath)
    ? config.sessionStatePath
    : undefined;

  const context = await browser.newContext({ storageState });
  context.setDefaultTimeout(config.globalTimeout);

  const page = await context.newPage();
  const automation = new PlaywrightPageAutomation(page, {
    timeoutMs: config.globalTimeout,
    logger,
  });

  return {
    browser,
    context,
    page,
    automation,
    close: async () => {
      await context.close().catch((error: unknown) => {
        logger?.debug({ err: error }, 'Browser context already closed');
      });
      await browser.close().catch((error: unknown) => {
        logger?.debug({ err: error }, 'Browser already closed');
      });
    },
  };
}

export function isMissingBrowserError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const message = error.message.toLowerCase();
  return message.includes('executable doesn') || message.includes('playwright install');
}

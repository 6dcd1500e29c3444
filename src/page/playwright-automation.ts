import type { Locator, Page } from 'playwright';
import type { Logger } from 'pino';
import { childRef, describeRef, ElementRef, PageAutomation } from './automation';

export interface PlaywrightAutomationOptions {
  timeoutMs: number;
  logger?: Logger;
}

export class PlaywrightPageAutomation implements PageAutomation {
  private page: Page;
  private timeoutMs: number;
  private logger?: Logger;

  constructor(page: Page, options: PlaywrightAutomationOptions) {
    this.page = page;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  async navigate(url: string): Promise<void> {
    this.logger?.debug({ url }, 'Navigating');
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.timeoutMs });
  }

  async reload(): Promise<void> {
    this.logger?.debug({ url: this.page.url() }, 'Reloading page');
    await this.page.reload({ waitUntil: 'domcontentloaded', timeout: this.timeoutMs });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async findAll(selector: string, within?: ElementRef, timeoutMs = this.timeoutMs): Promise<ElementRef[]> {
    const locator = this.scope(within).locator(selector);
    if (!(await this.attached(locator.first(), timeoutMs))) {
      return [];
    }

    const count = await locator.count();
    const refs: ElementRef[] = [];
    for (let i = 0; i < count; i += 1) {
      refs.push(childRef(within, selector, i));
    }
    return refs;
  }

  async findOne(
    selector: string,
    within?: ElementRef,
    timeoutMs = this.timeoutMs
  ): Promise<ElementRef | undefined> {
    const found = await this.attached(this.scope(within).locator(selector).first(), timeoutMs);
    return found ? childRef(within, selector, 0) : undefined;
  }

  async textOf(ref: ElementRef): Promise<string> {
    const text = await this.resolve(ref).innerText({ timeout: this.timeoutMs });
    return text.replace(/\s+/g, ' ').trim();
  }

  async attributeOf(ref: ElementRef, name: string): Promise<string | undefined> {
    const value = await this.resolve(ref).getAttribute(name, { timeout: this.timeoutMs });
    return value ?? undefined;
  }

  async click(ref: ElementRef): Promise<void> {
    const locator = this.resolve(ref);
    await locator.scrollIntoViewIfNeeded({ timeout: this.timeoutMs }).catch((error: unknown) => {
      this.logger?.debug({ err: error, element: describeRef(ref) }, 'Scroll into view skipped');
    });
    await locator.click({ timeout: this.timeoutMs });
  }

  async fill(ref: ElementRef, value: string): Promise<void> {
    await this.resolve(ref).fill(value, { timeout: this.timeoutMs });
  }

  async press(ref: ElementRef, key: string): Promise<void> {
    await this.resolve(ref).press(key, { timeout: this.timeoutMs });
  }

  async isPresent(selector: string, timeoutMs = 0): Promise<boolean> {
    return this.attached(this.page.locator(selector).first(), timeoutMs);
  }

  /** A zero timeout checks the current DOM without waiting. */
  private async attached(locator: Locator, timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return (await locator.count()) > 0;
    }
    return locator
      .waitFor({ state: 'attached', timeout: timeoutMs })
      .then(() => true)
      .catch(() => false);
  }

  private scope(within?: ElementRef): Page | Locator {
    return within ? this.resolve(within) : this.page;
  }

  private resolve(ref: ElementRef): Locator {
    const [first, ...rest] = ref.steps;
    if (!first) {
      throw new Error('Element reference is empty.');
    }
    let locator = this.page.locator(first.selector).nth(first.index);
    for (const step of rest) {
      locator = locator.locator(step.selector).nth(step.index);
    }
    return locator;
  }
}

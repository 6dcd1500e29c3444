/**
 * The narrow page-automation surface the engine and the booking sites work
 * through. Every call waits for at most the implementation's timeout; lookups
 * take a shorter `timeoutMs` where an absent element is an expected answer.
 */

export interface ElementStep {
  selector: string;
  index: number;
}

/** Opaque handle to an element: the chain of selector/index steps that reaches it. */
export interface ElementRef {
  readonly steps: readonly ElementStep[];
}

export interface PageAutomation {
  navigate(url: string): Promise<void>;
  reload(): Promise<void>;
  currentUrl(): string;
  findAll(selector: string, within?: ElementRef, timeoutMs?: number): Promise<ElementRef[]>;
  findOne(selector: string, within?: ElementRef, timeoutMs?: number): Promise<ElementRef | undefined>;
  textOf(ref: ElementRef): Promise<string>;
  attributeOf(ref: ElementRef, name: string): Promise<string | undefined>;
  click(ref: ElementRef): Promise<void>;
  fill(ref: ElementRef, value: string): Promise<void>;
  press(ref: ElementRef, key: string): Promise<void>;
  isPresent(selector: string, timeoutMs?: number): Promise<boolean>;
}

export function childRef(parent: ElementRef | undefined, selector: string, index: number): ElementRef {
  return { steps: [...(parent?.steps ?? []), { selector, index }] };
}

export function describeRef(ref: ElementRef): string {
  return ref.steps.map((step) => `${step.selector}[${step.index}]`).join(' >> ');
}

/** Finds one element or throws, naming what was expected. */
export async function requireOne(
  page: PageAutomation,
  selector: string,
  what: string,
  within?: ElementRef
): Promise<ElementRef> {
  const ref = await page.findOne(selector, within);
  if (!ref) {
    throw new Error(`Could not find ${what} (${selector}).`);
  }
  return ref;
}

export async function clickSelector(page: PageAutomation, selector: string, what: string): Promise<void> {
  await page.click(await requireOne(page, selector, what));
}

export async function fillSelector(
  page: PageAutomation,
  selector: string,
  value: string,
  what: string
): Promise<void> {
  await page.fill(await requireOne(page, selector, what), value);
}

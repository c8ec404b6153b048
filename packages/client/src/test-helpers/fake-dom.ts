/**
 * In-process stand-ins for the slice of Playwright's Page and ElementHandle
 * API the client touches. Every interaction is recorded in `calls`.
 */

import type { ElementHandle, Page } from "playwright";

export interface FakeElementSpec {
  text?: string;
  attrs?: Record<string, string>;
  /** Result of `$(selector)`. */
  children?: Record<string, FakeElementSpec>;
  /** Result of `$$(selector)`. */
  lists?: Record<string, FakeElementSpec[]>;
  /** Computed CSS transform returned by `evaluate`. */
  transform?: string;
  /** Make every query on this element reject. */
  broken?: boolean;
}

export class FakeElement {
  clicks = 0;
  private children = new Map<string, FakeElement>();
  private lists = new Map<string, FakeElement[]>();

  constructor(private spec: FakeElementSpec = {}) {
    for (const [selector, child] of Object.entries(spec.children ?? {})) {
      this.children.set(selector, new FakeElement(child));
    }
    for (const [selector, items] of Object.entries(spec.lists ?? {})) {
      this.lists.set(selector, items.map((item) => new FakeElement(item)));
    }
  }

  async $(selector: string): Promise<FakeElement | null> {
    if (this.spec.broken) throw new Error("element detached");
    return this.children.get(selector) ?? null;
  }

  async $$(selector: string): Promise<FakeElement[]> {
    if (this.spec.broken) throw new Error("element detached");
    return this.lists.get(selector) ?? [];
  }

  async innerText(): Promise<string> {
    return this.spec.text ?? "";
  }

  async getAttribute(name: string): Promise<string | null> {
    return this.spec.attrs?.[name] ?? null;
  }

  async evaluate(): Promise<string> {
    return this.spec.transform ?? "none";
  }

  async click(): Promise<void> {
    this.clicks++;
  }
}

export function timeoutError(message = "Timeout 5000ms exceeded."): Error {
  const err = new Error(message);
  err.name = "TimeoutError";
  return err;
}

export class FakeLocator {
  constructor(
    private selector: string,
    private page: FakePage,
  ) {}

  first(): FakeLocator {
    return this;
  }

  async click(): Promise<void> {
    this.page.calls.push(`click ${this.selector}`);
    const err = this.page.clickErrors.get(this.selector);
    if (err) throw err;
  }

  async pressSequentially(text: string): Promise<void> {
    this.page.calls.push(`fill ${this.selector} ${text}`);
  }

  async press(key: string): Promise<void> {
    this.page.calls.push(`press ${this.selector} ${key}`);
  }

  async innerText(): Promise<string> {
    const value = this.page.texts.get(this.selector);
    if (value instanceof Error) throw value;
    if (value === undefined) throw timeoutError();
    return value;
  }

  async boundingBox(): Promise<{ x: number; y: number; width: number; height: number } | null> {
    return this.page.boxes.get(this.selector) ?? null;
  }

  async evaluate(): Promise<number> {
    const heights = this.page.scrollHeights.get(this.selector) ?? [0];
    return heights.length > 1 ? (heights.shift() ?? 0) : (heights[0] ?? 0);
  }
}

export class FakePage {
  calls: string[] = [];
  elements = new Map<string, FakeElement>();
  elementLists = new Map<string, FakeElement[]>();
  texts = new Map<string, string | Error>();
  boxes = new Map<string, { x: number; y: number; width: number; height: number }>();
  scrollHeights = new Map<string, number[]>();
  clickErrors = new Map<string, Error>();
  /** Errors thrown by successive `goto` calls. */
  gotoErrors: Error[] = [];
  /** Called by `waitForTimeout`, e.g. to move a fake clock forward. */
  onWait: ((ms: number) => void) | null = null;

  keyboard = {
    press: async (key: string) => {
      this.calls.push(`key ${key}`);
    },
    type: async (text: string) => {
      this.calls.push(`type ${text}`);
    },
  };

  mouse = {
    move: async (x: number, y: number) => {
      this.calls.push(`move ${x},${y}`);
    },
    wheel: async (dx: number, dy: number) => {
      this.calls.push(`wheel ${dx},${dy}`);
    },
  };

  async goto(url: string): Promise<void> {
    this.calls.push(`goto ${url}`);
    const err = this.gotoErrors.shift();
    if (err) throw err;
  }

  async bringToFront(): Promise<void> {
    this.calls.push("bringToFront");
  }

  async waitForSelector(selector: string, options?: { timeout?: number }): Promise<void> {
    this.calls.push(`wait ${selector} ${options?.timeout ?? "default"}`);
  }

  async waitForTimeout(ms: number): Promise<void> {
    this.calls.push(`sleep ${ms}`);
    this.onWait?.(ms);
  }

  async waitForLoadState(state: string): Promise<void> {
    this.calls.push(`load ${state}`);
  }

  locator(selector: string): FakeLocator {
    return new FakeLocator(selector, this);
  }

  async $(selector: string): Promise<FakeElement | null> {
    return this.elements.get(selector) ?? null;
  }

  async $$(selector: string): Promise<FakeElement[]> {
    return this.elementLists.get(selector) ?? [];
  }
}

export function asHandle(el: FakeElement): ElementHandle<Element> {
  return el as unknown as ElementHandle<Element>;
}

export function asPage(page: FakePage): Page {
  return page as unknown as Page;
}

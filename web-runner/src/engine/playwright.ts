import type {
  AutomationEngine,
  BoundingBox,
  ElementHandle,
  ViewportSize,
} from "@flakeproof/resilience";

/**
 * The slice of Playwright's `Locator` the engine touches. A real `Locator`
 * satisfies it, and so can an in-memory fake.
 */
export interface LocatorLike {
  count(): Promise<number>;
  first(): LocatorLike;
  isVisible(): Promise<boolean>;
  textContent(options?: { timeout?: number }): Promise<string | null>;
  getAttribute(name: string, options?: { timeout?: number }): Promise<string | null>;
  click(options?: { timeout?: number }): Promise<void>;
  fill(value: string, options?: { timeout?: number }): Promise<void>;
  press(key: string, options?: { timeout?: number }): Promise<void>;
  boundingBox(options?: { timeout?: number }): Promise<BoundingBox | null>;
}

export interface PageLike {
  locator(selector: string): LocatorLike;
  viewportSize(): ViewportSize | null;
}

export interface PlaywrightEngineOptions {
  /** Cap on Playwright's own auto-wait inside element actions. */
  actionTimeoutMs?: number;
}

class PlaywrightElement implements ElementHandle {
  constructor(
    private readonly locator: LocatorLike,
    private readonly timeout: number,
  ) {}

  isVisible(): Promise<boolean> {
    return this.locator.isVisible();
  }

  async text(): Promise<string> {
    return (await this.locator.textContent({ timeout: this.timeout })) ?? "";
  }

  attribute(name: string): Promise<string | null> {
    return this.locator.getAttribute(name, { timeout: this.timeout });
  }

  click(): Promise<void> {
    return this.locator.click({ timeout: this.timeout });
  }

  fill(value: string): Promise<void> {
    return this.locator.fill(value, { timeout: this.timeout });
  }

  dismiss(): Promise<void> {
    return this.locator.press("Escape", { timeout: this.timeout });
  }

  boundingBox(): Promise<BoundingBox | null> {
    return this.locator.boundingBox({ timeout: this.timeout });
  }
}

/**
 * Adapts a caller-owned Playwright page to the engine contract. `locate`
 * never waits: it reports what is attached right now.
 */
export class PlaywrightEngine implements AutomationEngine {
  private readonly page: PageLike;
  private readonly actionTimeoutMs: number;

  constructor(page: PageLike, options: PlaywrightEngineOptions = {}) {
    this.page = page;
    this.actionTimeoutMs = options.actionTimeoutMs ?? 5_000;
  }

  async locate(descriptor: string): Promise<ElementHandle | null> {
    const locator = this.page.locator(descriptor);
    if ((await locator.count()) === 0) {
      return null;
    }
    return new PlaywrightElement(locator.first(), this.actionTimeoutMs);
  }

  count(descriptor: string): Promise<number> {
    return this.page.locator(descriptor).count();
  }

  async viewportSize(): Promise<ViewportSize | null> {
    return this.page.viewportSize();
  }
}

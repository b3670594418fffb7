import type { AutomationEngine, BoundingBox, Clock, ElementHandle, ViewportSize } from "../../src";

export interface FakeElementState {
  text?: string;
  attributes?: Record<string, string>;
  /** Clock time at which the element is attached. */
  appearsAt?: number;
  /** Clock time from which the attached element is visible. Defaults to always. */
  visibleAt?: number;
  hidden?: boolean;
  clickError?: Error;
  fillError?: Error;
  box?: BoundingBox;
}

export class FakeElement implements ElementHandle {
  clicks = 0;
  dismissals = 0;
  fills: string[] = [];

  constructor(
    private readonly clock: Clock,
    readonly state: FakeElementState,
  ) {}

  async isVisible(): Promise<boolean> {
    if (this.state.hidden) {
      return false;
    }
    return this.clock.now() >= (this.state.visibleAt ?? 0);
  }

  async text(): Promise<string> {
    return this.state.text ?? "";
  }

  async attribute(name: string): Promise<string | null> {
    return this.state.attributes?.[name] ?? null;
  }

  async click(): Promise<void> {
    if (this.state.clickError) {
      throw this.state.clickError;
    }
    this.clicks += 1;
  }

  async fill(value: string): Promise<void> {
    if (this.state.fillError) {
      throw this.state.fillError;
    }
    this.fills.push(value);
  }

  async dismiss(): Promise<void> {
    this.dismissals += 1;
  }

  async boundingBox(): Promise<BoundingBox | null> {
    return this.state.box ?? null;
  }
}

/** In-memory engine keyed by descriptor; time comes from the injected clock. */
export class FakeEngine implements AutomationEngine {
  readonly lookups: string[] = [];
  viewport: ViewportSize | null = null;
  private readonly elements = new Map<string, FakeElement[]>();
  private readonly locateErrors = new Map<string, Error>();

  constructor(
    private readonly clock: Clock,
    layout: Record<string, FakeElementState | FakeElementState[]> = {},
  ) {
    for (const [descriptor, state] of Object.entries(layout)) {
      const list = Array.isArray(state) ? state : [state];
      this.elements.set(
        descriptor,
        list.map((entry) => new FakeElement(clock, entry)),
      );
    }
  }

  element(descriptor: string, index = 0): FakeElement {
    const element = this.elements.get(descriptor)?.[index];
    if (!element) {
      throw new Error(`no fake element registered for ${descriptor}`);
    }
    return element;
  }

  failLocate(descriptor: string, error: Error): void {
    this.locateErrors.set(descriptor, error);
  }

  async locate(descriptor: string): Promise<ElementHandle | null> {
    this.lookups.push(descriptor);
    const error = this.locateErrors.get(descriptor);
    if (error) {
      throw error;
    }
    return this.attached(descriptor)[0] ?? null;
  }

  async viewportSize(): Promise<ViewportSize | null> {
    return this.viewport;
  }

  async count(descriptor: string): Promise<number> {
    return this.attached(descriptor).length;
  }

  private attached(descriptor: string): FakeElement[] {
    const now = this.clock.now();
    return (this.elements.get(descriptor) ?? []).filter(
      (element) => (element.state.appearsAt ?? 0) <= now,
    );
  }
}

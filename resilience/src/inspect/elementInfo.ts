import type { AutomationEngine, BoundingBox, ElementHandle, ViewportSize } from "../types";

export interface ElementInfo {
  visible: boolean;
  text: string;
  /** Only the attributes present on the element. */
  attributes: Record<string, string>;
  box: BoundingBox | null;
  /** `null` when the engine cannot report geometry. */
  inViewport: boolean | null;
}

export const INFO_ATTRIBUTES: readonly string[] = ["id", "class", "name", "type", "value"];

/** True when the whole box lies inside the viewport. */
export function isBoxInViewport(box: BoundingBox, viewport: ViewportSize): boolean {
  return (
    box.x >= 0 &&
    box.y >= 0 &&
    box.x + box.width <= viewport.width &&
    box.y + box.height <= viewport.height
  );
}

/**
 * Snapshot of an element for failure reports: visibility, text, the common
 * identifying attributes and, where the engine exposes geometry, whether it
 * sits fully inside the viewport.
 */
export async function inspectElement(
  engine: AutomationEngine,
  element: ElementHandle,
  attributeNames: readonly string[] = INFO_ATTRIBUTES,
): Promise<ElementInfo> {
  const attributes: Record<string, string> = {};
  for (const name of attributeNames) {
    const value = await element.attribute(name);
    if (value !== null) {
      attributes[name] = value;
    }
  }
  const box = (await element.boundingBox?.()) ?? null;
  const viewport = (await engine.viewportSize?.()) ?? null;
  return {
    visible: await element.isVisible(),
    text: await element.text(),
    attributes,
    box,
    inViewport: box && viewport ? isBoxInViewport(box, viewport) : null,
  };
}

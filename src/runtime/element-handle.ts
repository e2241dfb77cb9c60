import { JSHandle, type HandleKind } from "@/runtime/js-handle";

/**
 * Handle to a DOM node. Node-specific operations live in the page layer;
 * here it only answers `asElement()` with itself.
 */
export class ElementHandle extends JSHandle {
  override get kind(): HandleKind {
    return "element";
  }

  override asElement(): ElementHandle {
    return this;
  }
}

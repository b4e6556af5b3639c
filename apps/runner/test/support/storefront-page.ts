import { TransportFault } from "../../src/errors.js";
import type { WaitOptions, WebBackend } from "../../src/physical/types.js";

/**
 * Scripted stand-in for a storefront page. Tests set titles, counts,
 * texts and visibility per locator; `missing` locators make driving calls
 * fail with element-not-found and waits time out.
 */
export class ScriptedStorefront implements WebBackend {
  readonly calls: string[] = [];
  title = "";
  readonly titlesAfterGoto = new Map<string, string>();
  readonly titlesAfterClick = new Map<string, string>();
  readonly values = new Map<string, string>();
  readonly counts = new Map<string, number>();
  readonly visible = new Map<string, boolean>();
  readonly texts = new Map<string, string | null>();
  readonly missing = new Set<string>();

  async goto(url: string): Promise<void> {
    this.calls.push(`goto ${url}`);
    this.title = this.titlesAfterGoto.get(url) ?? this.title;
  }

  async fill(locator: string, text: string): Promise<void> {
    this.calls.push(`fill ${locator}`);
    this.ensure("fill", locator);
    this.values.set(locator, text);
  }

  async click(locator: string): Promise<void> {
    this.calls.push(`click ${locator}`);
    this.ensure("click", locator);
    this.title = this.titlesAfterClick.get(locator) ?? this.title;
  }

  async getText(locator: string): Promise<string | null> {
    this.calls.push(`getText ${locator}`);
    this.ensure("getText", locator);
    return this.texts.get(locator) ?? null;
  }

  async getValue(locator: string): Promise<string> {
    this.calls.push(`getValue ${locator}`);
    return this.values.get(locator) ?? "";
  }

  async isVisible(locator: string): Promise<boolean> {
    this.calls.push(`isVisible ${locator}`);
    return this.visible.get(locator) ?? false;
  }

  async getCount(locator: string): Promise<number> {
    this.calls.push(`getCount ${locator}`);
    return this.counts.get(locator) ?? 0;
  }

  async getTitle(): Promise<string> {
    this.calls.push("getTitle");
    return this.title;
  }

  async waitFor(locator: string, options: WaitOptions = {}): Promise<void> {
    this.calls.push(`waitFor ${locator}`);
    if (this.missing.has(locator)) {
      throw new TransportFault(
        "timeout",
        "waitFor",
        `waitFor ${locator} (${options.state ?? "visible"}) timed out after ${options.timeoutMs ?? 0}ms`,
      );
    }
  }

  private ensure(operation: string, locator: string): void {
    if (this.missing.has(locator)) {
      throw new TransportFault("element-not-found", operation, `No element matches ${locator}`);
    }
  }
}

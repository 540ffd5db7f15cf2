/**
 * Page automation capability consumed by search sessions.
 *
 * Locators are selector strings understood by the concrete driver (CSS by
 * default, `xpath=` prefixed XPath where the driver supports it). Element
 * handles are opaque: a driver only accepts handles it produced itself.
 */

export type ElementState = 'present' | 'visible' | 'clickable';

export interface PageElement {
  readonly description: string;
}

export interface WaitOptions {
  readonly timeoutMs: number;
  readonly state?: ElementState;
}

export interface PageDriver {
  navigate(url: string): Promise<void>;
  /** Resolves to `null` when the element does not reach the state in time. */
  waitForElement(locator: string, options: WaitOptions): Promise<PageElement | null>;
  findAll(locator: string, scope?: PageElement): Promise<readonly PageElement[]>;
  click(element: PageElement): Promise<void>;
  /** Clears the control, then types the text. */
  fill(element: PageElement, text: string): Promise<void>;
  readText(element: PageElement): Promise<string>;
  getAttribute(element: PageElement, name: string): Promise<string | null>;
  /** Runs a function body in the page; `args` must be serializable. */
  executeScript(script: string, args?: readonly unknown[]): Promise<unknown>;
  /** Brings a result row into view and selects it so the detail pane refreshes. */
  activateRow(row: PageElement): Promise<void>;
  /**
   * Waits until the detail pane is visible and its text differs from
   * `previousText`, then returns the settled text. The pane stays in the page
   * across row selections, so presence alone is no completion signal.
   */
  readUpdatedDetail(locator: string, previousText: string, timeoutMs: number): Promise<string>;
  close(): Promise<void>;
}

export interface PageDriverFactory {
  create(): Promise<PageDriver>;
}

export interface ElementTarget {
  selector: string;
  index?: number;
}

export type WaitState = 'attached' | 'visible';

export interface WaitOptions {
  timeoutMs: number;
  state?: WaitState;
}

export interface ClickOptions {
  timeoutMs: number;
  /** Pause between scrolling the target into view and clicking it. */
  settleMs?: number;
  block?: 'start' | 'center';
}

/**
 * The browser capability the navigation flows run against. Every wait is bounded by
 * the timeout it is given; `waitFor` and `waitForUrl` report a timeout as `false`.
 */
export interface SiteDriver {
  readonly key: string;
  goto(url: string): Promise<void>;
  currentUrl(): Promise<string>;
  content(): Promise<string>;
  count(selector: string): Promise<number>;
  texts(selector: string): Promise<string[]>;
  textOf(target: ElementTarget, timeoutMs: number): Promise<string>;
  attributeOf(target: ElementTarget, name: string, timeoutMs: number): Promise<string | null>;
  waitFor(target: ElementTarget | string, options: WaitOptions): Promise<boolean>;
  waitForUrl(fragment: string, timeoutMs: number): Promise<boolean>;
  fill(target: ElementTarget, value: string, timeoutMs: number): Promise<void>;
  isChecked(target: ElementTarget, timeoutMs: number): Promise<boolean>;
  click(target: ElementTarget, options: ClickOptions): Promise<void>;
  selectOption(target: ElementTarget, value: string, timeoutMs: number): Promise<void>;
  pause(ms: number): Promise<void>;
  screenshot(filePath: string): Promise<void>;
  close(): Promise<void>;
}

export function target(selector: string, index = 0): ElementTarget {
  return { selector, index };
}

export function toTarget(value: ElementTarget | string): ElementTarget {
  return typeof value === 'string' ? target(value) : value;
}

/** Scopes `child` to the n-th match of `parent`. */
export function within(parent: ElementTarget, child: string): string {
  return `${parent.selector} >> nth=${parent.index ?? 0} >> ${child}`;
}

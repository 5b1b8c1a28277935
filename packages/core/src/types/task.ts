/**
 * Task types
 *
 * A task is the caller-supplied unit of work: a target URL, an ordered list of
 * browser actions and a description of what to extract afterwards.
 */

/**
 * Page load milestone to wait for after navigation
 */
export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle' | 'commit';

/**
 * Navigate to a URL (the task target when omitted)
 */
export interface NavigateAction {
  type: 'navigate';
  url?: string;
  waitUntil?: WaitUntil;
}

/**
 * Wait until an element matching the selector is attached
 */
export interface WaitForSelectorAction {
  type: 'waitForSelector';
  selector: string;
  /** Capped by the task's remaining budget */
  timeoutMs?: number;
}

export interface ClickAction {
  type: 'click';
  selector: string;
}

/**
 * Clear an input and set its value
 */
export interface FillAction {
  type: 'fill';
  selector: string;
  value: string;
}

/**
 * Type text key by key, firing input events as a user would
 */
export interface TypeAction {
  type: 'type';
  selector: string;
  text: string;
  /** Delay between key presses */
  delayMs?: number;
}

export interface PressAction {
  type: 'press';
  selector: string;
  /** Key name, e.g. 'Enter' */
  key: string;
}

/**
 * Pause, e.g. to let client-side rendering settle
 */
export interface WaitAction {
  type: 'wait';
  durationMs: number;
}

/**
 * Browser action
 */
export type Action =
  | NavigateAction
  | WaitForSelectorAction
  | ClickAction
  | FillAction
  | TypeAction
  | PressAction
  | WaitAction;

export type ActionType = Action['type'];

/**
 * Scan used when every selector of a field comes back empty
 */
export interface ExtractionFallback {
  /** Broad selector to scan, e.g. 'div, span, li' */
  selector: string;
  /** Keep values containing this text (case-insensitive) */
  contains: string;
  /** Drop values of this length or longer */
  maxLength?: number;
  /** Maximum number of values kept from the scan */
  limit?: number;
}

/**
 * How to extract one named field
 */
export interface FieldExtraction {
  /** Selectors tried in order; the first yielding a value wins */
  selectors: readonly string[];
  /** Attribute to read instead of the rendered text */
  attribute?: string;
  /** Return every match instead of the first */
  multiple?: boolean;
  /** Values whose trimmed length does not exceed this are dropped */
  minLength?: number;
  /** Drop repeated values */
  unique?: boolean;
  /** Maximum number of values kept */
  limit?: number;
  fallback?: ExtractionFallback;
}

/**
 * Extraction specification, keyed by output field name
 */
export type ExtractionSpec = Record<string, FieldExtraction>;

/**
 * Extracted value of one field
 */
export type ExtractedValue = string | string[] | null;

/**
 * Extracted data, keyed by output field name
 */
export type ExtractedData = Record<string, ExtractedValue>;

/**
 * A validated, immutable task
 */
export interface Task {
  /** Unique task ID */
  readonly id: string;
  /** Target URL */
  readonly target: string;
  /** Actions performed in order */
  readonly actions: readonly Action[];
  /** What to extract once the actions complete */
  readonly extract: Readonly<ExtractionSpec>;
  /** Hard upper bound for one execution */
  readonly timeoutMs: number;
  /** Crash retries allowed */
  readonly maxRetries: number;
}

/**
 * Task as supplied by callers, before defaults are applied
 */
export interface TaskInput {
  id?: string;
  target: string;
  actions?: Action[];
  extract?: ExtractionSpec;
  timeoutMs?: number;
  maxRetries?: number;
}

/**
 * Defaults applied to task input
 */
export interface TaskDefaults {
  timeoutMs: number;
  maxRetries: number;
}

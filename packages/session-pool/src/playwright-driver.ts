/**
 * Playwright driver
 *
 * One Chrome process per handle, launched through playwright-core against a
 * system Chrome binary, with its own temporary profile directory.
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { chromium, type BrowserContext, type Page } from 'playwright-core';
import {
  sleep,
  type Action,
  type BrowserSettings,
  type Logger,
  type Task,
  type WaitUntil,
} from '@drover/core';
import { buildChromeArgs, findChromeExecutable } from './chrome.js';
import { DriverHandle } from './handle.js';
import type { DriverFactory, StepContext } from './types.js';

const BROWSER_GONE_PATTERN =
  /target (page, context or browser )?(has been )?closed|browser has (been closed|disconnected)|page crashed|connection closed|session closed|protocol error/i;

/**
 * Whether an error means the browser process or its page is gone
 */
export function isBrowserGoneError(error: unknown): boolean {
  return error instanceof Error && BROWSER_GONE_PATTERN.test(error.message);
}

/**
 * Element operations used by task actions
 */
export interface ActionLocator {
  waitFor(options: { state: 'attached'; timeout: number }): Promise<void>;
  click(options: { timeout: number }): Promise<void>;
  fill(value: string, options: { timeout: number }): Promise<void>;
  pressSequentially(text: string, options: { delay?: number; timeout: number }): Promise<void>;
  press(key: string, options: { timeout: number }): Promise<void>;
}

/**
 * The part of a Playwright page that task actions drive
 */
export interface ActionPage {
  goto(url: string, options: { waitUntil: WaitUntil; timeout: number }): Promise<unknown>;
  locator(selector: string): { first(): ActionLocator };
}

/**
 * Run one task action against a page
 *
 * Element steps act on the first match of their selector, so a selector
 * matching several elements never trips Playwright's strict mode.
 */
export async function performPageAction(page: ActionPage, action: Action, task: Task, ctx: StepContext): Promise<void> {
  const timeout = ctx.remainingMs();

  switch (action.type) {
    case 'navigate':
      await page.goto(action.url ?? task.target, {
        waitUntil: action.waitUntil ?? 'load',
        timeout,
      });
      break;
    case 'waitForSelector':
      await page.locator(action.selector).first().waitFor({
        state: 'attached',
        timeout: Math.min(action.timeoutMs ?? timeout, timeout),
      });
      break;
    case 'click':
      await page.locator(action.selector).first().click({ timeout });
      break;
    case 'fill':
      await page.locator(action.selector).first().fill(action.value, { timeout });
      break;
    case 'type':
      await page.locator(action.selector).first().pressSequentially(action.text, {
        delay: action.delayMs,
        timeout,
      });
      break;
    case 'press':
      await page.locator(action.selector).first().press(action.key, { timeout });
      break;
    case 'wait':
      await sleep(action.durationMs, ctx.signal);
      break;
  }
}

/**
 * Driver handle backed by a persistent Chrome context
 */
export class PlaywrightDriverHandle extends DriverHandle {
  private connected = true;

  private constructor(
    id: string,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly profileDir: string,
    logger?: Logger
  ) {
    super(id, logger);
    context.on('close', () => {
      this.connected = false;
    });
    page.on('crash', () => {
      this.connected = false;
    });
  }

  /**
   * Launch Chrome for one handle
   */
  static async launch(id: string, settings: BrowserSettings, logger?: Logger): Promise<PlaywrightDriverHandle> {
    const profileDir = await mkdtemp(join(settings.profileDir ?? tmpdir(), `drover-${id}-`));
    const executablePath = settings.executablePath ?? findChromeExecutable();

    try {
      const context = await chromium.launchPersistentContext(profileDir, {
        headless: settings.headless,
        ...(executablePath ? { executablePath } : { channel: 'chrome' }),
        args: buildChromeArgs(settings),
        timeout: settings.launchTimeoutMs,
        userAgent: settings.userAgent,
        viewport: { width: settings.viewportWidth, height: settings.viewportHeight },
      });
      const page = context.pages()[0] ?? (await context.newPage());
      return new PlaywrightDriverHandle(id, context, page, profileDir, logger);
    } catch (error) {
      await rm(profileDir, { recursive: true, force: true });
      throw error;
    }
  }

  protected async performAction(action: Action, _index: number, task: Task, ctx: StepContext): Promise<void> {
    await performPageAction(this.page, action, task, ctx);
  }

  protected async readSelector(selector: string, attribute: string | undefined, ctx: StepContext): Promise<string[]> {
    try {
      const locator = this.page.locator(selector);
      if (attribute === undefined) {
        return await locator.allInnerTexts();
      }

      const values: string[] = [];
      const count = await locator.count();
      for (let i = 0; i < count; i++) {
        const value = await locator.nth(i).getAttribute(attribute, { timeout: ctx.remainingMs() });
        if (value !== null) {
          values.push(value);
        }
      }
      return values;
    } catch (error) {
      if (this.isCrash(error)) {
        throw error;
      }
      // A selector that cannot be evaluated matches nothing
      this.logger.debug({ selector, err: error }, 'Selector read failed');
      return [];
    }
  }

  protected async probe(): Promise<boolean> {
    if (!this.connected) {
      return false;
    }
    const value = await this.page.evaluate(() => 1);
    return value === 1;
  }

  protected async terminate(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await rm(this.profileDir, { recursive: true, force: true });
    }
  }

  protected isCrash(error: unknown): boolean {
    return !this.connected || this.page.isClosed() || isBrowserGoneError(error);
  }
}

/**
 * Driver factory launching one Chrome per handle
 */
export function createPlaywrightDriverFactory(settings: BrowserSettings, logger?: Logger): DriverFactory {
  return (id) => PlaywrightDriverHandle.launch(id, settings, logger);
}

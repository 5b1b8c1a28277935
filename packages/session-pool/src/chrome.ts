/**
 * Chrome discovery and launch flags
 */

import { existsSync } from 'fs';
import { CHROME_BINARY_PATHS, type BrowserSettings } from '@drover/core';

/**
 * First existing Chrome or Chromium binary among the candidates
 */
export function findChromeExecutable(
  candidates: readonly string[] = CHROME_BINARY_PATHS,
  exists: (path: string) => boolean = existsSync
): string | undefined {
  return candidates.find((path) => exists(path));
}

/**
 * Command-line flags for one browser process
 *
 * Headless mode follows `settings.headless` through the launch options, so
 * `--headless` flags in the configured args are dropped.
 */
export function buildChromeArgs(settings: BrowserSettings): string[] {
  const args = settings.args.filter(
    (arg) => !arg.startsWith('--window-size=') && arg !== '--headless' && !arg.startsWith('--headless=')
  );
  args.push(`--window-size=${settings.viewportWidth},${settings.viewportHeight}`);
  return args;
}

/**
 * Browser session for one collection run
 */
import * as fs from 'fs';
import puppeteer from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import { Browser } from 'puppeteer-core';
import { AppLogger } from '../../utils/logger';
import { AmazonStorefront, AmazonStorefrontOptions, DEFAULT_STOREFRONT_OPTIONS } from './AmazonStorefront';
import { SessionHandle } from './types';

// Hide automation indicators from bot detection
puppeteer.use(StealthPlugin());

export interface BrowserOptions {
  headless: boolean;
  /** Chrome/Chromium binary; falls back to CHROME_BIN and common install paths */
  executablePath?: string;
}

const CHROME_PATHS = [
  // Linux / containers
  '/usr/bin/chromium',
  '/usr/bin/chromium-browser',
  '/usr/bin/google-chrome',
  '/usr/bin/google-chrome-stable',
  // macOS
  '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
  '/Applications/Chromium.app/Contents/MacOS/Chromium',
  '/Applications/Microsoft Edge.app/Contents/MacOS/Microsoft Edge',
];

export function findChromePath(
  explicitPath: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  exists: (path: string) => boolean = fs.existsSync
): string {
  if (explicitPath) {
    return explicitPath;
  }
  if (env.CHROME_BIN) {
    return env.CHROME_BIN;
  }

  for (const path of CHROME_PATHS) {
    if (exists(path)) {
      return path;
    }
  }

  throw new Error('Chrome not found. Install Chrome or Chromium, or set CHROME_BIN to its path');
}

/**
 * Launch the browser and wrap it in a handle that owns it.
 * The caller must close the handle on every exit path.
 */
export async function openStorefrontSession(
  browserOptions: BrowserOptions,
  storefrontOptions: AmazonStorefrontOptions = DEFAULT_STOREFRONT_OPTIONS
): Promise<SessionHandle> {
  const executablePath = findChromePath(browserOptions.executablePath);
  AppLogger.info(`[Session] Launching browser at ${executablePath}`);

  const browser: Browser = await puppeteer.launch({
    executablePath,
    headless: browserOptions.headless,
    args: [
      '--no-sandbox',
      '--disable-dev-shm-usage',
      '--disable-gpu',
      '--disable-blink-features=AutomationControlled',
      '--window-size=1920,1080',
    ],
    defaultViewport: {
      width: 1920,
      height: 1080,
    },
    ignoreDefaultArgs: ['--enable-automation'],
  });

  try {
    const page = await browser.newPage();
    const source = new AmazonStorefront(page, storefrontOptions);

    let closed = false;
    return {
      source,
      close: async () => {
        if (closed) {
          return;
        }
        closed = true;
        AppLogger.info('[Session] Closing browser...');
        await browser.close();
      },
    };
  } catch (error) {
    await browser.close();
    throw error;
  }
}

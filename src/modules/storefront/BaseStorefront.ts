/**
 * Base class for storefront automation
 * Provides common page helpers for login, navigation and scraping
 */
import { Page } from 'puppeteer-core';
import { InvoiceRef, Order, OrderCardResult, StorefrontCredentials } from '../../types';
import { AppLogger } from '../../utils/logger';
import { ScrapeSource } from './types';

export abstract class BaseStorefront implements ScrapeSource {
  abstract storefrontKey: string;

  /** Default timeout for page operations (ms) */
  protected readonly defaultTimeout = 30000;

  /** Default wait after navigation (ms) */
  protected readonly navigationWait = 2000;

  constructor(protected page: Page) {}

  abstract login(credentials: StorefrontCredentials): Promise<void>;
  abstract listOrders(year: number): AsyncIterable<OrderCardResult>;
  abstract listInvoiceRefs(order: Order): Promise<InvoiceRef[]>;
  abstract fetchInvoice(ref: InvoiceRef): Promise<Buffer>;

  /**
   * Navigate to a URL and wait for network to settle
   */
  protected async navigateTo(url: string): Promise<void> {
    this.log(`Navigating to: ${url}`, 'debug');
    await this.page.goto(url, {
      waitUntil: 'networkidle2',
      timeout: this.defaultTimeout,
    });
    await this.wait(this.navigationWait);
  }

  /**
   * Wait for specified milliseconds
   */
  protected async wait(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  protected async waitForSelector(
    selector: string,
    options: { visible?: boolean; timeout?: number } = {}
  ): Promise<void> {
    const { visible = true, timeout = this.defaultTimeout } = options;
    await this.page.waitForSelector(selector, { visible, timeout });
  }

  /**
   * Type text into an input field with human-like delay
   */
  protected async typeWithDelay(selector: string, text: string, delay: number = 50): Promise<void> {
    await this.waitForSelector(selector);
    await this.page.click(selector, { count: 3 });
    await this.page.type(selector, text, { delay });
  }

  protected async elementExists(selector: string): Promise<boolean> {
    try {
      const element = await this.page.$(selector);
      return element !== null;
    } catch {
      return false;
    }
  }

  /**
   * Close open popovers and overlays
   */
  protected async pressEscape(): Promise<void> {
    await this.page.keyboard.press('Escape');
    await this.wait(300);
  }

  protected log(message: string, level: 'debug' | 'info' | 'warn' | 'error' = 'info'): void {
    const prefixed = `[${this.storefrontKey}] ${message}`;
    switch (level) {
      case 'debug':
        AppLogger.debug(prefixed);
        break;
      case 'warn':
        AppLogger.warn(prefixed);
        break;
      case 'error':
        AppLogger.error(prefixed);
        break;
      default:
        AppLogger.info(prefixed);
    }
  }
}

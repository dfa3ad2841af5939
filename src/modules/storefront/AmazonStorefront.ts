/**
 * Amazon Business order history scraper
 *
 * Flow:
 * 1. Sign in (the sign-in link may open a popup window)
 * 2. Open the order history filtered by year
 * 3. Read every order card, page by page
 * 4. Open each card's invoice popover and collect the PDF links
 * 5. Download PDFs with the browser session's cookies
 */
import { ElementHandle, Page } from 'puppeteer-core';
import { InvoiceRef, Order, OrderCardResult, StorefrontCredentials } from '../../types';
import {
  AuthenticationError,
  DeliveryError,
  NavigationError,
  OrderScrapeError,
  errorMessage,
} from '../../errors';
import { BaseStorefront } from './BaseStorefront';
import { parseOrderCard, toInvoiceRefs } from './OrderParser';
import { RawInvoiceLink, RawOrderCard } from './types';

/**
 * Amazon-specific selectors
 */
export const SELECTORS = {
  // Sign-in
  signInLink: "a[data-signin-link='true']",
  emailInput: "input[type='email']",
  continueButton: 'input#continue',
  passwordInput: "input[type='password']",
  signInSubmit: '#signInSubmit',
  authError: '#auth-error-message-box, #auth-warning-message-box',

  // Order history
  orderCard: '#orderCard, .order-card',
  orderHeaderField: '#orderCardHeader .a-size-base, .order-header .a-size-base',
  orderIdField: "#orderIdField, [id*='orderId'], [id*='OrderId'], .yohtmlc-order-id",
  nextPage: 'ul.a-pagination li.a-last:not(.a-disabled) a',

  // Invoice popover
  popover: '.a-popover',
  invoiceList: 'ul.invoice-list, .invoice-list',
  invoicePdfLink: "a[href*='invoice.pdf']",
};

const PASSKEY_SKIP_WORDS = ['not now', 'skip', 'maybe later', 'no thanks', 'dismiss', 'nicht jetzt', 'später'];

/** Upper bound on result pages per year */
const MAX_PAGES = 100;

export interface AmazonStorefrontOptions {
  /** Page carrying the sign-in link */
  loginUrl: string;
  /** Storefront hosting the order history */
  baseUrl: string;
  /** How long to wait for an invoice popover (ms) */
  popoverTimeout?: number;
  /** How long to wait for the sign-in popup window (ms) */
  popupTimeout?: number;
}

export const DEFAULT_STOREFRONT_OPTIONS: AmazonStorefrontOptions = {
  loginUrl: 'https://business.amazon.de',
  baseUrl: 'https://www.amazon.de',
};

export class AmazonStorefront extends BaseStorefront {
  storefrontKey = 'amazon';

  private readonly options: AmazonStorefrontOptions;

  /** Order cards of the page currently shown, by order id */
  private cards = new Map<string, ElementHandle<Element>>();

  constructor(page: Page, options: AmazonStorefrontOptions = DEFAULT_STOREFRONT_OPTIONS) {
    super(page);
    this.options = options;
  }

  orderHistoryUrl(year: number): string {
    return `${this.options.baseUrl}/gp/css/order-history#time/${year}/pagination/1/`;
  }

  async login(credentials: StorefrontCredentials): Promise<void> {
    this.log('Signing in...');

    try {
      await this.navigateTo(this.options.loginUrl);

      if (await this.elementExists(SELECTORS.signInLink)) {
        const popup = this.waitForPopup();
        await this.page.click(SELECTORS.signInLink);
        const popupPage = await popup;
        if (popupPage) {
          this.log('Sign-in opened in a new window', 'debug');
          this.page = popupPage;
        }
      }

      await this.typeWithDelay(SELECTORS.emailInput, credentials.email);

      if (
        !(await this.elementExists(SELECTORS.passwordInput)) &&
        (await this.elementExists(SELECTORS.continueButton))
      ) {
        await this.page.click(SELECTORS.continueButton);
      }

      await this.typeWithDelay(SELECTORS.passwordInput, credentials.password);

      await Promise.all([
        this.page
          .waitForNavigation({ waitUntil: 'networkidle2', timeout: this.defaultTimeout })
          .catch(() => null),
        this.page.click(SELECTORS.signInSubmit),
      ]);
    } catch (error) {
      throw new AuthenticationError(`Sign-in did not complete: ${errorMessage(error)}`, true, {
        cause: error,
      });
    }

    if (await this.elementExists(SELECTORS.authError)) {
      throw new AuthenticationError('The storefront rejected the credentials', false);
    }
    if (await this.elementExists(SELECTORS.passwordInput)) {
      throw new AuthenticationError('Still on the sign-in page after submitting credentials', true);
    }

    this.log('Sign-in completed');
    await this.dismissPasskeyPrompt();
  }

  /**
   * Resolve with the window opened by the current page, or null if none appears
   */
  private async waitForPopup(): Promise<Page | null> {
    const opener = this.page.target();
    try {
      const target = await this.page
        .browser()
        .waitForTarget(candidate => candidate.opener() === opener, {
          timeout: this.options.popupTimeout ?? 10000,
        });
      return await target.page();
    } catch {
      return null;
    }
  }

  /**
   * Dismiss the "use a passkey" interstitial shown after sign-in
   */
  private async dismissPasskeyPrompt(): Promise<void> {
    try {
      await this.wait(2000);

      const dismissed = await this.page.evaluate((skipWords: string[]) => {
        const candidates = Array.from(document.querySelectorAll<HTMLElement>('button, a, span'));
        for (const element of candidates) {
          const text = (element.textContent || '').trim().toLowerCase();
          if (skipWords.some(word => text.includes(word)) && element.getClientRects().length > 0) {
            element.click();
            return true;
          }
        }

        const closeButton = document.querySelector<HTMLElement>(
          "button[aria-label*='close' i], .close-button, [data-action='close']"
        );
        if (closeButton && closeButton.getClientRects().length > 0) {
          closeButton.click();
          return true;
        }
        return false;
      }, PASSKEY_SKIP_WORDS);

      if (dismissed) {
        this.log('Dismissed passkey prompt');
        await this.wait(2000);
      }
    } catch (error) {
      // Sign-in already succeeded; the page may be navigating away
      this.log(`Passkey prompt check skipped: ${errorMessage(error)}`, 'debug');
    }
  }

  async *listOrders(year: number): AsyncGenerator<OrderCardResult> {
    let url: string | null = this.orderHistoryUrl(year);

    for (let pageNumber = 1; url && pageNumber <= MAX_PAGES; pageNumber++) {
      try {
        await this.navigateTo(url);
      } catch (error) {
        throw new NavigationError(
          `Cannot open order history page ${pageNumber} for ${year}: ${errorMessage(error)}`,
          { cause: error }
        );
      }

      const cards = await this.page.$$(SELECTORS.orderCard);
      this.log(`Year ${year}, page ${pageNumber}: ${cards.length} order card(s)`);
      this.cards.clear();

      for (const card of cards) {
        yield await this.readCard(card);
      }

      url = await this.page
        .$eval(SELECTORS.nextPage, link => (link instanceof HTMLAnchorElement ? link.href : null))
        .catch(() => null);
    }
  }

  private async readCard(card: ElementHandle<Element>): Promise<OrderCardResult> {
    try {
      const raw = await card.evaluate(
        (element, selectors): RawOrderCard => {
          const headerTexts = Array.from(element.querySelectorAll(selectors.header)).map(
            field => (field.textContent || '').trim()
          );
          const idField = element.querySelector(selectors.orderId);
          return {
            headerTexts: headerTexts.filter(text => text.length > 0),
            orderIdText: idField ? (idField.textContent || '').trim() : null,
          };
        },
        { header: SELECTORS.orderHeaderField, orderId: SELECTORS.orderIdField }
      );

      const order = parseOrderCard(raw);
      this.cards.set(order.orderId, card);
      return { ok: true, order };
    } catch (error) {
      if (error instanceof OrderScrapeError) {
        return { ok: false, error };
      }
      return {
        ok: false,
        error: new OrderScrapeError(`Cannot read order card: ${errorMessage(error)}`, undefined, {
          cause: error,
        }),
      };
    }
  }

  async listInvoiceRefs(order: Order): Promise<InvoiceRef[]> {
    const card = this.cards.get(order.orderId);
    if (!card) {
      throw new OrderScrapeError(`Order card ${order.orderId} is no longer on the page`, order.orderId);
    }

    await this.pressEscape();

    try {
      const opened = await card.evaluate(element => {
        const links = Array.from(element.querySelectorAll<HTMLAnchorElement>('a'));
        const trigger = links.find(link => {
          const text = (link.textContent || '').trim().toLowerCase();
          const href = (link.getAttribute('href') || '').toLowerCase();
          const className = (link.getAttribute('class') || '').toLowerCase();
          return (
            (text.includes('rechnung') && !text.includes('anfordern')) ||
            (text.includes('invoice') && !text.includes('request')) ||
            (href.includes('invoice') && className.includes('popover'))
          );
        });
        if (!trigger) {
          return false;
        }
        trigger.scrollIntoView({ block: 'center' });
        trigger.click();
        return true;
      });

      if (!opened) {
        throw new OrderScrapeError(`Invoice link not found for order ${order.orderId}`, order.orderId);
      }

      const links = await this.readInvoicePopover(order);
      return toInvoiceRefs(order, links, this.options.baseUrl);
    } finally {
      await this.pressEscape();
    }
  }

  private async readInvoicePopover(order: Order): Promise<RawInvoiceLink[]> {
    const selectors = {
      popover: SELECTORS.popover,
      list: SELECTORS.invoiceList,
      link: SELECTORS.invoicePdfLink,
    };

    try {
      await this.page.waitForFunction(
        (s: typeof selectors) =>
          Array.from(document.querySelectorAll(s.popover)).some(
            popover =>
              popover.getAttribute('aria-hidden') !== 'true' &&
              popover.getClientRects().length > 0 &&
              popover.querySelector(s.list) !== null
          ),
        { timeout: this.options.popoverTimeout ?? this.defaultTimeout },
        selectors
      );
    } catch (error) {
      throw new OrderScrapeError(`Invoice popover did not appear for order ${order.orderId}`, order.orderId, {
        cause: error,
      });
    }

    return this.page.evaluate((s: typeof selectors) => {
      const popover = Array.from(document.querySelectorAll(s.popover)).find(
        candidate =>
          candidate.getAttribute('aria-hidden') !== 'true' &&
          candidate.getClientRects().length > 0 &&
          candidate.querySelector(s.list) !== null
      );
      if (!popover) {
        return [];
      }
      return Array.from(popover.querySelectorAll<HTMLAnchorElement>(s.link)).map(link => ({
        href: link.href,
        text: (link.textContent || '').trim(),
      }));
    }, selectors);
  }

  async fetchInvoice(ref: InvoiceRef): Promise<Buffer> {
    const cookies = await this.page.cookies(ref.url);
    const userAgent = await this.page.browser().userAgent();

    const response = await fetch(ref.url, {
      headers: {
        Cookie: cookies.map(cookie => `${cookie.name}=${cookie.value}`).join('; '),
        'User-Agent': userAgent,
      },
      signal: AbortSignal.timeout(60000),
    });

    if (!response.ok) {
      throw new DeliveryError(`Invoice download failed with HTTP ${response.status}: ${ref.url}`);
    }

    return Buffer.from(await response.arrayBuffer());
  }
}

import ora from 'ora';
import { InvoiceRef, Order, OrderCardResult, RunSummary } from './types';
import { CollectorConfig } from './config';
import { AuthenticationError, NavigationError, errorMessage } from './errors';
import { InvoiceStateStore } from './modules/state/InvoiceStateStore';
import { SinkDispatcher } from './modules/sinks/SinkDispatcher';
import { InvoiceReconciler } from './modules/reconcile/InvoiceReconciler';
import { ScrapeSource, SessionHandle } from './modules/storefront/types';
import { AppLogger } from './utils/logger';
import { getYearsToCheck, isOlderThanDays } from './utils/dateUtils';
import { withRetry } from './utils/retry';

export const LOGIN_RETRY_DELAY_MS = 5000;
export const YEAR_NAVIGATION_ATTEMPTS = 3;
export const YEAR_NAVIGATION_DELAY_MS = 2000;

/** Paid orders older than this should have an invoice by now */
const MISSING_INVOICE_WARNING_DAYS = 14;

export interface CollectorDeps {
  config: CollectorConfig;
  store: InvoiceStateStore;
  dispatcher: SinkDispatcher;
  openSession: () => Promise<SessionHandle>;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export function emptySummary(): RunSummary {
  return {
    years: [],
    yearsFailed: [],
    ordersScanned: 0,
    ordersSkipped: 0,
    invoicesProcessed: 0,
    invoicesAlreadyProcessed: 0,
    invoicesFailed: 0,
  };
}

/**
 * 1 when invoices were attempted and none of them could be processed
 */
export function summaryExitCode(summary: RunSummary): number {
  const attempted = summary.invoicesProcessed + summary.invoicesFailed;
  return attempted > 0 && summary.invoicesProcessed === 0 ? 1 : 0;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export class Collector {
  private readonly deps: CollectorDeps;
  private stopRequested = false;

  constructor(deps: CollectorDeps) {
    this.deps = deps;
  }

  /**
   * Finish the current order, then end the run
   */
  requestStop(): void {
    if (!this.stopRequested) {
      AppLogger.info('[Collector] Stop requested, finishing the current order');
    }
    this.stopRequested = true;
  }

  async run(): Promise<RunSummary> {
    const { config, store, dispatcher } = this.deps;
    const now = this.deps.now ? this.deps.now() : new Date();
    const summary = emptySummary();

    const years = getYearsToCheck(now, config.minYear);
    if (years.length === 0) {
      AppLogger.warn(
        `[Collector] Minimum year ${config.minYear} is after the current year, nothing to scan`
      );
      return summary;
    }

    console.log(`\n📅 Years: ${years.join(', ')}`);
    console.log(`📦 Destinations: ${dispatcher.sinkNames.join(', ')}`);
    console.log('');

    const spinner = ora();
    let session: SessionHandle;
    try {
      spinner.start('Launching browser...');
      session = await this.deps.openSession();
      spinner.succeed('Browser launched');
    } catch (error) {
      spinner.fail(`Browser launch failed: ${errorMessage(error)}`);
      throw error;
    }

    try {
      spinner.start('Signing in...');
      await this.login(session.source);
      spinner.succeed('Signed in');

      const reconciler = new InvoiceReconciler(store, dispatcher, session.source);
      for (const year of years) {
        if (this.stopRequested) {
          break;
        }
        await this.collectYear(year, session.source, reconciler, summary, now);
      }
    } catch (error) {
      spinner.fail(`Error: ${errorMessage(error)}`);
      throw error;
    } finally {
      await session.close();
    }

    this.logSummary(summary);
    return summary;
  }

  private async login(source: ScrapeSource): Promise<void> {
    const { config } = this.deps;
    await withRetry(() => source.login(config.credentials), {
      attempts: config.loginRetries + 1,
      delayMs: LOGIN_RETRY_DELAY_MS,
      shouldRetry: error => !(error instanceof AuthenticationError) || error.retryable,
      onRetry: (error, attempt) =>
        AppLogger.warn(`[Collector] Sign-in attempt ${attempt} failed: ${errorMessage(error)}. Retrying...`),
      sleep: this.deps.sleep ?? defaultSleep,
    });
  }

  /**
   * Walk one year's order history. A year whose pages cannot be opened is
   * retried only while none of its orders has been handled yet.
   */
  private async collectYear(
    year: number,
    source: ScrapeSource,
    reconciler: InvoiceReconciler,
    summary: RunSummary,
    now: Date
  ): Promise<void> {
    const sleep = this.deps.sleep ?? defaultSleep;
    summary.years.push(year);
    AppLogger.info(`[Collector] Scanning orders of ${year}`);

    for (let attempt = 1; ; attempt++) {
      let handled = 0;
      try {
        for await (const result of source.listOrders(year)) {
          handled++;
          await this.handleCard(result, source, reconciler, summary, now);
          if (this.stopRequested) {
            return;
          }
        }
        return;
      } catch (error) {
        if (!(error instanceof NavigationError)) {
          throw error;
        }
        if (handled === 0 && attempt < YEAR_NAVIGATION_ATTEMPTS) {
          AppLogger.warn(`[Collector] ${error.message}. Retrying (${attempt}/${YEAR_NAVIGATION_ATTEMPTS - 1})...`);
          await sleep(YEAR_NAVIGATION_DELAY_MS);
          continue;
        }
        AppLogger.error(`[Collector] Skipping the rest of ${year}`, error);
        summary.yearsFailed.push(year);
        return;
      }
    }
  }

  private async handleCard(
    result: OrderCardResult,
    source: ScrapeSource,
    reconciler: InvoiceReconciler,
    summary: RunSummary,
    now: Date
  ): Promise<void> {
    summary.ordersScanned++;

    if (!result.ok) {
      summary.ordersSkipped++;
      AppLogger.warn(`[Collector] Skipping order: ${result.error.message}`);
      return;
    }

    const { order } = result;
    let refs: InvoiceRef[];
    try {
      refs = await source.listInvoiceRefs(order);
    } catch (error) {
      summary.ordersSkipped++;
      AppLogger.warn(`[Collector] Skipping order ${order.orderId}: ${errorMessage(error)}`);
      return;
    }

    if (refs.length === 0) {
      this.warnIfInvoiceMissing(order, now);
      return;
    }

    const outcome = await reconciler.reconcileOrder(order, refs);
    summary.invoicesProcessed += outcome.delivered.length;
    summary.invoicesAlreadyProcessed += outcome.alreadyProcessed;
    summary.invoicesFailed += outcome.failed.length;
  }

  private warnIfInvoiceMissing(order: Order, now: Date): void {
    if (
      order.totalPrice !== null &&
      order.totalPrice > 0 &&
      isOlderThanDays(order.orderDate, MISSING_INVOICE_WARNING_DAYS, now)
    ) {
      AppLogger.warn(
        `[Collector] Order ${order.orderId} from ${order.dateText} (${order.priceText ?? order.totalPrice}) has no invoice after ${MISSING_INVOICE_WARNING_DAYS} days`
      );
    } else {
      AppLogger.debug(`[Collector] Order ${order.orderId} has no invoice yet`);
    }
  }

  private logSummary(summary: RunSummary): void {
    const stats = this.deps.store.stats();
    AppLogger.info(
      `[Collector] Run finished: years ${summary.years.join(', ') || '-'}, ` +
        `${summary.ordersScanned} order(s) scanned, ${summary.ordersSkipped} skipped, ` +
        `${summary.invoicesProcessed} invoice(s) processed, ` +
        `${summary.invoicesAlreadyProcessed} already processed, ${summary.invoicesFailed} failed`
    );
    if (summary.yearsFailed.length > 0) {
      AppLogger.warn(`[Collector] Years not fully scanned: ${summary.yearsFailed.join(', ')}`);
    }
    AppLogger.info(
      `[Collector] Ledger: ${stats.invoices} invoice(s) across ${stats.orders} order(s) ` +
        `(local ${stats.deliveredLocal}, paperless ${stats.deliveredRemote})`
    );
  }
}

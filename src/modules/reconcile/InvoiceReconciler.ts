/**
 * Reconciles freshly scraped invoice links against the processed-invoice ledger
 *
 * For each order the reconciler works out which invoices are new, fetches and
 * delivers them one at a time in scraped order, and commits each invoice to the
 * ledger only after a sink confirmed it. A failing invoice stays uncommitted and
 * is picked up again by the next run.
 */
import { DestinationInfo, InvoiceRef, Order } from '../../types';
import { errorMessage } from '../../errors';
import { AppLogger } from '../../utils/logger';
import { InvoiceStateStore } from '../state/InvoiceStateStore';
import { SinkDispatcher } from '../sinks/SinkDispatcher';
import { FileNamingService } from '../naming/FileNamingService';

export interface InvoiceFetcher {
  fetchInvoice(ref: InvoiceRef): Promise<Buffer>;
}

export interface DeliveredInvoice {
  ref: InvoiceRef;
  filename: string;
  destination: DestinationInfo;
}

export interface FailedInvoice {
  ref: InvoiceRef;
  filename: string;
  error: string;
}

export interface OrderReconciliation {
  orderId: string;
  /** Distinct invoices exposed by the order */
  scraped: number;
  alreadyProcessed: number;
  delivered: DeliveredInvoice[];
  failed: FailedInvoice[];
}

/**
 * Drop repeated links to the same document, keeping the first occurrence
 */
export function dedupeRefs(refs: InvoiceRef[]): InvoiceRef[] {
  const seen = new Set<string>();
  return refs.filter(ref => {
    if (seen.has(ref.key)) {
      return false;
    }
    seen.add(ref.key);
    return true;
  });
}

export class InvoiceReconciler {
  constructor(
    private readonly store: InvoiceStateStore,
    private readonly dispatcher: SinkDispatcher,
    private readonly fetcher: InvoiceFetcher,
    private readonly naming: FileNamingService = new FileNamingService()
  ) {}

  /**
   * Invoices of `order` that are not yet in the ledger, in scraped order
   */
  planOrder(order: Order, refs: InvoiceRef[]): InvoiceRef[] {
    const unique = dedupeRefs(refs);
    const storedCount = this.store.countForOrder(order.orderId);

    if (unique.length <= storedCount) {
      return [];
    }

    const stored = this.store.refsForOrder(order.orderId);
    return unique.filter(ref => !stored.has(ref.key));
  }

  async reconcileOrder(order: Order, refs: InvoiceRef[]): Promise<OrderReconciliation> {
    const unique = dedupeRefs(refs);
    const work = this.planOrder(order, unique);
    const result: OrderReconciliation = {
      orderId: order.orderId,
      scraped: unique.length,
      alreadyProcessed: unique.length - work.length,
      delivered: [],
      failed: [],
    };

    if (work.length === 0) {
      AppLogger.info(
        `[Reconciler] Order ${order.orderId}: all ${unique.length} invoice(s) already processed`
      );
      return result;
    }

    AppLogger.info(`[Reconciler] Order ${order.orderId}: ${work.length} new invoice(s) of ${unique.length}`);

    for (const ref of work) {
      const filename = this.naming.generate(order, unique.indexOf(ref) + 1, unique.length);

      let data: Buffer;
      try {
        data = await this.fetcher.fetchInvoice(ref);
      } catch (error) {
        result.failed.push({ ref, filename, error: errorMessage(error) });
        AppLogger.error(`[Reconciler] Failed to fetch ${filename}`, error);
        continue;
      }

      const delivery = await this.dispatcher.deliver({
        order,
        ref,
        filename,
        title: this.naming.title(order),
        data,
      });

      if (!delivery.success) {
        const reasons = delivery.failures.map(f => `${f.sink}: ${f.error}`).join('; ');
        result.failed.push({ ref, filename, error: reasons });
        AppLogger.warn(`[Reconciler] Not recording ${filename}: no destination accepted it`);
        continue;
      }

      this.store.record({
        orderId: order.orderId,
        invoiceRef: ref.key,
        invoiceUrl: ref.url,
        destination: delivery.destination,
      });
      result.delivered.push({ ref, filename, destination: delivery.destination });
      AppLogger.info(`[Reconciler] Processed ${filename}`);
    }

    return result;
  }
}

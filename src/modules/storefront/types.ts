/**
 * Storefront scraping contracts
 */
import { InvoiceRef, Order, OrderCardResult, StorefrontCredentials } from '../../types';

/**
 * Text pulled from one order card before validation
 */
export interface RawOrderCard {
  /** Texts of the card header fields (date, total, ...) */
  headerTexts: string[];
  /** Text of the order number field, null when absent */
  orderIdText: string | null;
}

/**
 * Link found in an invoice popover
 */
export interface RawInvoiceLink {
  href: string;
  text: string;
}

/**
 * Source of orders and invoice documents
 */
export interface ScrapeSource {
  login(credentials: StorefrontCredentials): Promise<void>;
  /** Orders of one year, walking every result page */
  listOrders(year: number): AsyncIterable<OrderCardResult>;
  listInvoiceRefs(order: Order): Promise<InvoiceRef[]>;
  fetchInvoice(ref: InvoiceRef): Promise<Buffer>;
}

/**
 * Browser session owned by one run; must be closed on every exit path
 */
export interface SessionHandle {
  source: ScrapeSource;
  close(): Promise<void>;
}

/**
 * Type definitions for the invoice archiver
 */

/**
 * An order as read from an order card. Lives only for one scrape pass.
 */
export interface Order {
  orderId: string;
  orderDate: Date;
  /** Date as displayed on the card */
  dateText: string;
  /** Order total, null when the card shows none */
  totalPrice: number | null;
  priceText: string | null;
  year: number;
}

/**
 * A downloadable invoice document attached to an order
 */
export interface InvoiceRef {
  orderId: string;
  /** Dedup identity: the document UUID within the link, or the link itself */
  key: string;
  /** Absolute download link */
  url: string;
  /** Link text from the invoice popover */
  label: string;
}

/**
 * Sinks that actually received an invoice
 */
export interface DestinationInfo {
  localPath?: string;
  /** Paperless-ngx consumption task id */
  remoteId?: string;
}

/**
 * One row of the processed-invoice ledger
 */
export interface ProcessedInvoice {
  orderId: string;
  invoiceRef: string;
  invoiceUrl: string;
  deliveredLocal: boolean;
  localPath: string | null;
  deliveredRemote: boolean;
  remoteId: string | null;
  processedAt: string;
}

export interface LedgerStats {
  orders: number;
  invoices: number;
  deliveredLocal: number;
  deliveredRemote: number;
}

export interface StorefrontCredentials {
  email: string;
  password: string;
}

/**
 * Result of reading one order card: a validated order or the reason it was skipped
 */
export type OrderCardResult =
  | { ok: true; order: Order }
  | { ok: false; error: Error };

/**
 * Invoice document handed to the sinks
 */
export interface InvoiceDocument {
  order: Order;
  ref: InvoiceRef;
  filename: string;
  title: string;
  data: Buffer;
}

export interface RunSummary {
  years: number[];
  yearsFailed: number[];
  ordersScanned: number;
  ordersSkipped: number;
  invoicesProcessed: number;
  invoicesAlreadyProcessed: number;
  invoicesFailed: number;
}

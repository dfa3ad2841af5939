/**
 * Validation of scraped order cards and invoice links
 */
import { InvoiceRef, Order } from '../../types';
import { OrderScrapeError } from '../../errors';
import { parseOrderDate } from '../../utils/dateUtils';
import { RawInvoiceLink, RawOrderCard } from './types';

const UUID_PATTERN = /[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/i;

const CURRENCY_PATTERN = /€|EUR|\$|£/;

/**
 * Extract the order number from the order id field text
 * e.g. "Bestellnr. 302-1234567-7654321" -> "302-1234567-7654321"
 */
export function extractOrderId(text: string): string | null {
  for (const part of text.trim().split(/\s+/)) {
    if (part.includes('-') && part.length > 10) {
      return part;
    }
  }
  return null;
}

/**
 * Parse a displayed price such as "€ 1.234,56", "12,99 €" or "$1,234.56"
 */
export function parsePrice(text: string): number | null {
  const cleaned = text.replace(/[^\d.,]/g, '');
  if (!/\d/.test(cleaned)) {
    return null;
  }

  const lastComma = cleaned.lastIndexOf(',');
  const lastDot = cleaned.lastIndexOf('.');
  const decimalIndex = Math.max(lastComma, lastDot);
  const digitsAfter = decimalIndex === -1 ? 0 : cleaned.length - decimalIndex - 1;

  let normalized: string;
  if (decimalIndex !== -1 && digitsAfter > 0 && digitsAfter <= 2) {
    const integerPart = cleaned.slice(0, decimalIndex).replace(/[.,]/g, '');
    normalized = `${integerPart}.${cleaned.slice(decimalIndex + 1)}`;
  } else {
    // No decimal part: every separator groups thousands
    normalized = cleaned.replace(/[.,]/g, '');
  }

  const value = Number(normalized);
  return Number.isNaN(value) ? null : value;
}

/**
 * Turn a raw order card into a validated order.
 * Throws OrderScrapeError when the order number or date cannot be read.
 */
export function parseOrderCard(raw: RawOrderCard): Order {
  const orderId = raw.orderIdText ? extractOrderId(raw.orderIdText) : null;
  if (!orderId) {
    throw new OrderScrapeError('Order card has no readable order number');
  }

  let dateText: string | null = null;
  let orderDate: Date | null = null;
  for (const text of raw.headerTexts) {
    const parsed = parseOrderDate(text);
    if (parsed) {
      dateText = text.trim();
      orderDate = parsed;
      break;
    }
  }
  if (!orderDate || !dateText) {
    throw new OrderScrapeError(`Order ${orderId} has no readable order date`, orderId);
  }

  const priceText = raw.headerTexts.find(text => CURRENCY_PATTERN.test(text))?.trim() ?? null;

  return {
    orderId,
    orderDate,
    dateText,
    totalPrice: priceText ? parsePrice(priceText) : null,
    priceText,
    year: orderDate.getFullYear(),
  };
}

/**
 * Dedup key of an invoice link: the document UUID when the link carries one
 */
export function invoiceKeyFromUrl(url: string): string {
  const match = url.match(UUID_PATTERN);
  return match ? match[0].toLowerCase() : url;
}

/**
 * Build invoice references from popover links, resolving relative links and
 * dropping repeats of the same document
 */
export function toInvoiceRefs(order: Order, links: RawInvoiceLink[], baseUrl: string): InvoiceRef[] {
  const refs: InvoiceRef[] = [];
  const seen = new Set<string>();

  for (const link of links) {
    if (!link.href) {
      continue;
    }
    const url = new URL(link.href, baseUrl).toString();
    const key = invoiceKeyFromUrl(url);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    refs.push({
      orderId: order.orderId,
      key,
      url,
      label: link.text.trim() || `Invoice ${refs.length + 1}`,
    });
  }

  return refs;
}

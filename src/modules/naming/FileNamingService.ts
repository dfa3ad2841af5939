/**
 * File naming service
 */

import { Order } from '../../types';
import { formatCompactDate } from '../../utils/dateUtils';

export class FileNamingService {
  constructor(private readonly prefix: string = 'AMZ') {}

  /**
   * Generate the invoice file name
   * Format: PREFIX_YYYYMMDD_OrderId[_N].pdf, N only when the order has several invoices
   *
   * @param position 1-based position of the invoice within the order
   * @param total number of invoices the order exposes
   */
  generate(order: Order, position: number, total: number): string {
    const base = `${this.prefix}_${formatCompactDate(order.orderDate)}_${this.sanitize(order.orderId)}`;
    return total > 1 ? `${base}_${position}.pdf` : `${base}.pdf`;
  }

  /**
   * Document title used by the document-management system
   */
  title(order: Order): string {
    return `Amazon Invoice ${order.orderId} - ${order.dateText}`;
  }

  /**
   * Remove or replace invalid file name characters: \/:*?"<>|
   */
  private sanitize(value: string): string {
    return value.replace(/[\\/:*?"<>|]/g, '-').trim();
  }
}

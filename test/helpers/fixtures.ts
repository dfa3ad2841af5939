import { InvoiceRef, Order } from '../../src/types';

export function makeOrder(overrides: Partial<Order> = {}): Order {
  return {
    orderId: '302-1234567-7654321',
    orderDate: new Date(2024, 11, 30),
    dateText: '30. Dezember 2024',
    totalPrice: 42.5,
    priceText: '€ 42,50',
    year: 2024,
    ...overrides,
  };
}

export function makeRef(orderId: string, n: number): InvoiceRef {
  const key = `00000000-0000-0000-0000-${String(n).padStart(12, '0')}`;
  return {
    orderId,
    key,
    url: `https://www.amazon.de/documents/download/${key}/invoice.pdf`,
    label: `Rechnung ${n}`,
  };
}

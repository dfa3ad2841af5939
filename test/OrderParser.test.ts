import {
  extractOrderId,
  invoiceKeyFromUrl,
  parseOrderCard,
  parsePrice,
  toInvoiceRefs,
} from '../src/modules/storefront/OrderParser';
import { OrderScrapeError } from '../src/errors';
import { Order } from '../src/types';

const order: Order = {
  orderId: '302-1234567-7654321',
  orderDate: new Date(2024, 11, 30),
  dateText: '30. Dezember 2024',
  totalPrice: 42.5,
  priceText: '€ 42,50',
  year: 2024,
};

describe('OrderParser', () => {
  describe('extractOrderId', () => {
    it('should take the order number out of the label', () => {
      expect(extractOrderId('Bestellnr. 302-1234567-7654321')).toBe('302-1234567-7654321');
    });

    it('should return null without an order number', () => {
      expect(extractOrderId('Bestellnr.')).toBeNull();
      expect(extractOrderId('a-b')).toBeNull();
    });
  });

  describe('parsePrice', () => {
    it('should parse German formatted prices', () => {
      expect(parsePrice('€ 1.234,56')).toBe(1234.56);
      expect(parsePrice('12,99 €')).toBe(12.99);
    });

    it('should parse English formatted prices', () => {
      expect(parsePrice('$1,234.56')).toBe(1234.56);
    });

    it('should treat a three-digit group as thousands', () => {
      expect(parsePrice('€ 1.234')).toBe(1234);
    });

    it('should return null without digits', () => {
      expect(parsePrice('EUR')).toBeNull();
    });
  });

  describe('parseOrderCard', () => {
    it('should build an order from the header fields', () => {
      const parsed = parseOrderCard({
        headerTexts: ['Bestellung aufgegeben', '30. Dezember 2024', 'Summe', '€ 42,50'],
        orderIdText: 'Bestellnr. 302-1234567-7654321',
      });

      expect(parsed).toEqual(order);
    });

    it('should leave the price empty when the card shows none', () => {
      const parsed = parseOrderCard({
        headerTexts: ['30 December 2024'],
        orderIdText: '302-1234567-7654321',
      });

      expect(parsed.totalPrice).toBeNull();
      expect(parsed.priceText).toBeNull();
    });

    it('should reject a card without an order number', () => {
      expect(() => parseOrderCard({ headerTexts: ['30. Dezember 2024'], orderIdText: null })).toThrow(
        OrderScrapeError
      );
    });

    it('should reject a card without a readable date', () => {
      expect(() =>
        parseOrderCard({ headerTexts: ['gestern'], orderIdText: '302-1234567-7654321' })
      ).toThrow('Order 302-1234567-7654321 has no readable order date');
    });
  });

  describe('invoiceKeyFromUrl', () => {
    it('should use the lower-cased document id', () => {
      expect(
        invoiceKeyFromUrl('https://www.amazon.de/documents/download/AB12CD34-0000-1111-2222-333344445555/invoice.pdf')
      ).toBe('ab12cd34-0000-1111-2222-333344445555');
    });

    it('should fall back to the whole link', () => {
      expect(invoiceKeyFromUrl('https://www.amazon.de/invoice.pdf?id=7')).toBe(
        'https://www.amazon.de/invoice.pdf?id=7'
      );
    });
  });

  describe('toInvoiceRefs', () => {
    it('should resolve relative links and drop repeated documents', () => {
      const refs = toInvoiceRefs(
        order,
        [
          { href: '/documents/download/11111111-aaaa-bbbb-cccc-000000000001/invoice.pdf', text: 'Rechnung 1' },
          { href: 'https://www.amazon.de/documents/download/11111111-aaaa-bbbb-cccc-000000000001/invoice.pdf', text: 'Rechnung 1' },
          { href: '/documents/download/11111111-aaaa-bbbb-cccc-000000000002/invoice.pdf', text: '  ' },
          { href: '', text: 'broken' },
        ],
        'https://www.amazon.de'
      );

      expect(refs).toEqual([
        {
          orderId: order.orderId,
          key: '11111111-aaaa-bbbb-cccc-000000000001',
          url: 'https://www.amazon.de/documents/download/11111111-aaaa-bbbb-cccc-000000000001/invoice.pdf',
          label: 'Rechnung 1',
        },
        {
          orderId: order.orderId,
          key: '11111111-aaaa-bbbb-cccc-000000000002',
          url: 'https://www.amazon.de/documents/download/11111111-aaaa-bbbb-cccc-000000000002/invoice.pdf',
          label: 'Invoice 2',
        },
      ]);
    });
  });
});

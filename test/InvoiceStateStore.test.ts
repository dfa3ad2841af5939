import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { InvoiceStateStore } from '../src/modules/state/InvoiceStateStore';
import { StateStoreError } from '../src/errors';

describe('InvoiceStateStore', () => {
  let store: InvoiceStateStore;

  beforeEach(() => {
    store = new InvoiceStateStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('should start empty', () => {
    expect(store.countForOrder('A-1')).toBe(0);
    expect(store.refsForOrder('A-1').size).toBe(0);
    expect(store.list()).toEqual([]);
    expect(store.stats()).toEqual({ orders: 0, invoices: 0, deliveredLocal: 0, deliveredRemote: 0 });
  });

  it('should record an invoice with its destinations', () => {
    const inserted = store.record(
      {
        orderId: 'A-1',
        invoiceRef: 'ref-1',
        invoiceUrl: 'https://example.test/ref-1/invoice.pdf',
        destination: { localPath: '/tmp/a.pdf', remoteId: 'task-1' },
      },
      new Date('2025-01-10T08:00:00.000Z')
    );

    expect(inserted).toBe(true);
    expect(store.exists('A-1', 'ref-1')).toBe(true);
    expect(store.exists('A-1', 'ref-2')).toBe(false);
    expect(store.list()).toEqual([
      {
        orderId: 'A-1',
        invoiceRef: 'ref-1',
        invoiceUrl: 'https://example.test/ref-1/invoice.pdf',
        deliveredLocal: true,
        localPath: '/tmp/a.pdf',
        deliveredRemote: true,
        remoteId: 'task-1',
        processedAt: '2025-01-10T08:00:00.000Z',
      },
    ]);
  });

  it('should ignore a second record of the same invoice', () => {
    const input = {
      orderId: 'A-1',
      invoiceRef: 'ref-1',
      invoiceUrl: 'https://example.test/ref-1/invoice.pdf',
      destination: { localPath: '/tmp/a.pdf' },
    };

    expect(store.record(input)).toBe(true);
    expect(store.record({ ...input, destination: { remoteId: 'task-9' } })).toBe(false);
    expect(store.countForOrder('A-1')).toBe(1);
    expect(store.list()[0].remoteId).toBeNull();
  });

  it('should count invoices per order and in total', () => {
    store.record({ orderId: 'A-1', invoiceRef: 'r1', invoiceUrl: 'u1', destination: { localPath: 'p1' } });
    store.record({ orderId: 'A-1', invoiceRef: 'r2', invoiceUrl: 'u2', destination: { remoteId: 't2' } });
    store.record({
      orderId: 'B-2',
      invoiceRef: 'r3',
      invoiceUrl: 'u3',
      destination: { localPath: 'p3', remoteId: 't3' },
    });

    expect(store.countForOrder('A-1')).toBe(2);
    expect(store.refsForOrder('A-1')).toEqual(new Set(['r1', 'r2']));
    expect(store.stats()).toEqual({ orders: 2, invoices: 3, deliveredLocal: 2, deliveredRemote: 2 });
  });

  it('should wrap failures after close as StateStoreError', () => {
    store.close();
    expect(() => store.countForOrder('A-1')).toThrow(StateStoreError);
  });

  it('should keep rows across reopening a database file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'invoice-state-'));
    const dbPath = path.join(dir, 'invoices.db');

    try {
      const first = new InvoiceStateStore(dbPath);
      first.record({ orderId: 'A-1', invoiceRef: 'r1', invoiceUrl: 'u1', destination: { localPath: 'p1' } });
      first.close();

      const second = new InvoiceStateStore(dbPath);
      expect(second.exists('A-1', 'r1')).toBe(true);
      second.close();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should report an unusable path as StateStoreError', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'invoice-state-'));
    try {
      expect(() => new InvoiceStateStore(path.join(dir, 'missing', 'invoices.db'))).toThrow(StateStoreError);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

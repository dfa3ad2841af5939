import { SinkDispatcher } from '../src/modules/sinks/SinkDispatcher';
import { InvoiceSink } from '../src/modules/sinks/types';
import { ConfigurationError } from '../src/errors';
import { InvoiceDocument } from '../src/types';
import { makeOrder, makeRef } from './helpers/fixtures';

const order = makeOrder();
const document: InvoiceDocument = {
  order,
  ref: makeRef(order.orderId, 1),
  filename: 'AMZ_20241230_302-1234567-7654321.pdf',
  title: 'Amazon Invoice 302-1234567-7654321 - 30. Dezember 2024',
  data: Buffer.from('%PDF-1.4'),
};

describe('SinkDispatcher', () => {
  it('should reject an empty sink list', () => {
    expect(() => new SinkDispatcher([])).toThrow(ConfigurationError);
  });

  it('should merge destinations of every sink that succeeded', async () => {
    const local: InvoiceSink = { name: 'local', deliver: jest.fn().mockResolvedValue({ localPath: '/out/a.pdf' }) };
    const paperless: InvoiceSink = { name: 'paperless', deliver: jest.fn().mockResolvedValue({ remoteId: 'task-1' }) };

    const result = await new SinkDispatcher([local, paperless]).deliver(document);

    expect(result).toEqual({
      success: true,
      destination: { localPath: '/out/a.pdf', remoteId: 'task-1' },
      failures: [],
    });
  });

  it('should succeed when any sink succeeds', async () => {
    const local: InvoiceSink = { name: 'local', deliver: jest.fn().mockResolvedValue({ localPath: '/out/a.pdf' }) };
    const paperless: InvoiceSink = {
      name: 'paperless',
      deliver: jest.fn().mockRejectedValue(new Error('HTTP 500')),
    };

    const result = await new SinkDispatcher([local, paperless]).deliver(document);

    expect(result).toEqual({
      success: true,
      destination: { localPath: '/out/a.pdf' },
      failures: [{ sink: 'paperless', error: 'HTTP 500' }],
    });
  });

  it('should attempt every sink even after a failure', async () => {
    const local: InvoiceSink = { name: 'local', deliver: jest.fn().mockRejectedValue(new Error('EACCES')) };
    const paperless: InvoiceSink = { name: 'paperless', deliver: jest.fn().mockResolvedValue({ remoteId: 'task-2' }) };

    const result = await new SinkDispatcher([local, paperless]).deliver(document);

    expect(paperless.deliver).toHaveBeenCalledWith(document);
    expect(result.success).toBe(true);
    expect(result.destination).toEqual({ remoteId: 'task-2' });
  });

  it('should fail when every sink fails', async () => {
    const local: InvoiceSink = { name: 'local', deliver: jest.fn().mockRejectedValue(new Error('EACCES')) };

    const result = await new SinkDispatcher([local]).deliver(document);

    expect(result).toEqual({ success: false, destination: {}, failures: [{ sink: 'local', error: 'EACCES' }] });
  });

  it('should expose the configured sink names', () => {
    const local: InvoiceSink = { name: 'local', deliver: jest.fn() };
    expect(new SinkDispatcher([local]).sinkNames).toEqual(['local']);
  });
});

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LocalFileSink } from '../src/modules/sinks/LocalFileSink';
import { AppLogger } from '../src/utils/logger';
import { InvoiceDocument } from '../src/types';
import { makeOrder, makeRef } from './helpers/fixtures';

describe('LocalFileSink', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'invoice-sink-'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    AppLogger.setLevel('info');
    fs.rmSync(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  it('should create the folder and write the invoice', async () => {
    const order = makeOrder();
    const outputDir = path.join(dir, 'invoices', '2024');
    const document: InvoiceDocument = {
      order,
      ref: makeRef(order.orderId, 1),
      filename: 'AMZ_20241230_302-1234567-7654321.pdf',
      title: 'Amazon Invoice',
      data: Buffer.from('%PDF-1.4 test'),
    };

    const destination = await new LocalFileSink(outputDir).deliver(document);

    const expectedPath = path.join(outputDir, 'AMZ_20241230_302-1234567-7654321.pdf');
    expect(destination).toEqual({ localPath: expectedPath });
    expect(fs.readFileSync(expectedPath, 'utf8')).toBe('%PDF-1.4 test');
    expect(fs.readdirSync(outputDir)).toEqual(['AMZ_20241230_302-1234567-7654321.pdf']);
  });

  it('should remove the partial file when the write cannot be completed', async () => {
    const order = makeOrder();
    const filename = 'AMZ_20241230_302-1234567-7654321.pdf';
    // A non-empty directory at the target path makes the rename fail
    fs.mkdirSync(path.join(dir, filename));
    fs.writeFileSync(path.join(dir, filename, 'keep.txt'), 'x');
    const document: InvoiceDocument = {
      order,
      ref: makeRef(order.orderId, 1),
      filename,
      title: 'Amazon Invoice',
      data: Buffer.from('%PDF-1.4 test'),
    };

    await expect(new LocalFileSink(dir).deliver(document)).rejects.toThrow();
    expect(fs.readdirSync(dir)).toEqual([filename]);
  });

  it('should log through AppLogger and respect the level', async () => {
    AppLogger.setLevel('error');
    const order = makeOrder();
    const document: InvoiceDocument = {
      order,
      ref: makeRef(order.orderId, 1),
      filename: 'quiet.pdf',
      title: 'Amazon Invoice',
      data: Buffer.from('%PDF'),
    };

    await new LocalFileSink(dir).deliver(document);

    expect(console.log).not.toHaveBeenCalled();
  });
});

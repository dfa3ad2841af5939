/**
 * Saves invoices into a local directory
 */
import * as fs from 'fs';
import * as path from 'path';
import { DestinationInfo, InvoiceDocument } from '../../types';
import { AppLogger } from '../../utils/logger';
import { InvoiceSink } from './types';

export class LocalFileSink implements InvoiceSink {
  readonly name = 'local' as const;

  constructor(private readonly outputDir: string) {}

  async deliver(document: InvoiceDocument): Promise<DestinationInfo> {
    await fs.promises.mkdir(this.outputDir, { recursive: true });

    const filePath = path.join(this.outputDir, document.filename);
    const tempPath = `${filePath}.part`;

    // The target is either absent or complete
    try {
      await fs.promises.writeFile(tempPath, document.data);
      await fs.promises.rename(tempPath, filePath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }

    AppLogger.info(`[LocalFileSink] Saved ${filePath}`);
    return { localPath: filePath };
  }
}

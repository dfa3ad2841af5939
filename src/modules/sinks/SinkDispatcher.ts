/**
 * Routes an invoice to every configured sink
 */
import { DestinationInfo, InvoiceDocument } from '../../types';
import { ConfigurationError, errorMessage } from '../../errors';
import { AppLogger } from '../../utils/logger';
import { DeliveryResult, InvoiceSink, SinkFailure } from './types';

export class SinkDispatcher {
  private readonly sinks: InvoiceSink[];

  constructor(sinks: InvoiceSink[]) {
    if (sinks.length === 0) {
      throw new ConfigurationError('At least one invoice destination must be configured');
    }
    this.sinks = sinks;
  }

  get sinkNames(): string[] {
    return this.sinks.map(sink => sink.name);
  }

  /**
   * Attempt every sink independently. The invoice counts as delivered when any
   * sink succeeds; the destination lists only the sinks that did.
   */
  async deliver(document: InvoiceDocument): Promise<DeliveryResult> {
    let destination: DestinationInfo = {};
    const failures: SinkFailure[] = [];
    let succeeded = 0;

    for (const sink of this.sinks) {
      try {
        const received = await sink.deliver(document);
        destination = { ...destination, ...received };
        succeeded++;
      } catch (error) {
        const message = errorMessage(error);
        failures.push({ sink: sink.name, error: message });
        AppLogger.warn(`[SinkDispatcher] ${sink.name} failed for ${document.filename}: ${message}`);
      }
    }

    return { success: succeeded > 0, destination, failures };
  }
}

/**
 * Sink contracts
 */
import { DestinationInfo, InvoiceDocument } from '../../types';

export type SinkName = 'local' | 'paperless';

/**
 * A destination that durably receives invoice documents.
 * `deliver` resolves with what the sink stored and rejects on failure.
 */
export interface InvoiceSink {
  readonly name: SinkName;
  deliver(document: InvoiceDocument): Promise<DestinationInfo>;
}

export interface SinkFailure {
  sink: SinkName;
  error: string;
}

export interface DeliveryResult {
  success: boolean;
  /** Only the sinks that succeeded */
  destination: DestinationInfo;
  failures: SinkFailure[];
}

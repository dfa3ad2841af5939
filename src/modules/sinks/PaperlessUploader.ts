/**
 * Paperless-ngx Uploader
 * Posts invoices to the Paperless-ngx document consumption API
 */
import { DestinationInfo, InvoiceDocument } from '../../types';
import { DeliveryError } from '../../errors';
import { formatDate } from '../../utils/dateUtils';
import { AppLogger } from '../../utils/logger';
import { InvoiceSink } from './types';

/**
 * Paperless-ngx connection and classification settings
 */
export interface PaperlessConfig {
  url: string;
  token: string;
  correspondent?: number;
  documentType?: number;
  storagePath?: number;
  tags: number[];
}

/**
 * Uploader service for sending invoices to Paperless-ngx
 */
export class PaperlessUploader implements InvoiceSink {
  readonly name = 'paperless' as const;
  private endpoint: string;

  constructor(private readonly config: PaperlessConfig) {
    this.endpoint = `${config.url.replace(/\/+$/, '')}/api/documents/post_document/`;
  }

  /**
   * Build the multipart form expected by post_document
   */
  buildForm(document: InvoiceDocument): FormData {
    const form = new FormData();
    form.append(
      'document',
      new Blob([new Uint8Array(document.data)], { type: 'application/pdf' }),
      document.filename
    );
    form.append('title', document.title);
    form.append('created', formatDate(document.order.orderDate));

    if (this.config.correspondent !== undefined) {
      form.append('correspondent', String(this.config.correspondent));
    }
    if (this.config.documentType !== undefined) {
      form.append('document_type', String(this.config.documentType));
    }
    if (this.config.storagePath !== undefined) {
      form.append('storage_path', String(this.config.storagePath));
    }
    // Paperless expects one "tags" field per tag
    for (const tag of this.config.tags) {
      form.append('tags', String(tag));
    }

    return form;
  }

  /**
   * Upload a document; resolves with the consumption task id
   */
  async deliver(document: InvoiceDocument): Promise<DestinationInfo> {
    AppLogger.debug(`[Paperless] Uploading ${document.filename}...`);

    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers: {
        Authorization: `Token ${this.config.token}`,
      },
      body: this.buildForm(document),
      signal: AbortSignal.timeout(30000),
    });

    const body = await response.text();
    if (response.status !== 200) {
      throw new DeliveryError(
        `Paperless upload of ${document.filename} failed with HTTP ${response.status}: ${body}`
      );
    }

    const taskId = this.parseTaskId(body);
    AppLogger.info(`[Paperless] Uploaded ${document.filename}, task ${taskId}`);
    return { remoteId: taskId };
  }

  private parseTaskId(body: string): string {
    try {
      const parsed: unknown = JSON.parse(body);
      if (typeof parsed === 'string' && parsed.length > 0) {
        return parsed;
      }
    } catch {
      // Older Paperless versions answer with plain text ("OK")
    }
    return body.trim() || 'accepted';
  }
}

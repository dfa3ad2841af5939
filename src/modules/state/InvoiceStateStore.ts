/**
 * Processed-invoice ledger backed by SQLite
 *
 * One row per (order id, invoice reference) that reached at least one sink.
 * Rows are only ever inserted; recording a known key is a no-op.
 */
import Database from 'better-sqlite3';
import { DestinationInfo, LedgerStats, ProcessedInvoice } from '../../types';
import { StateStoreError, errorMessage } from '../../errors';
import { AppLogger } from '../../utils/logger';

const SCHEMA_VERSION = 1;

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS processed_invoices (
    order_id TEXT NOT NULL,
    invoice_ref TEXT NOT NULL,
    invoice_url TEXT NOT NULL,
    delivered_local INTEGER NOT NULL DEFAULT 0,
    local_path TEXT,
    delivered_remote INTEGER NOT NULL DEFAULT 0,
    remote_id TEXT,
    processed_at TEXT NOT NULL,
    PRIMARY KEY (order_id, invoice_ref)
  );
  CREATE INDEX IF NOT EXISTS idx_processed_invoices_order_id
    ON processed_invoices(order_id);
`;

interface ProcessedInvoiceRow {
  order_id: string;
  invoice_ref: string;
  invoice_url: string;
  delivered_local: number;
  local_path: string | null;
  delivered_remote: number;
  remote_id: string | null;
  processed_at: string;
}

interface StatsRow {
  orders: number;
  invoices: number;
  delivered_local: number | null;
  delivered_remote: number | null;
}

export interface RecordInput {
  orderId: string;
  invoiceRef: string;
  invoiceUrl: string;
  destination: DestinationInfo;
}

export class InvoiceStateStore {
  private db: Database.Database;

  /**
   * @param dbPath SQLite file path, or ':memory:'
   */
  constructor(dbPath: string) {
    this.db = InvoiceStateStore.openDatabase(dbPath);
    AppLogger.debug(`[StateStore] Opened ${dbPath}`);
  }

  private static openDatabase(dbPath: string): Database.Database {
    try {
      const db = new Database(dbPath);
      db.pragma('journal_mode = WAL');
      db.exec(SCHEMA_SQL);
      if (db.pragma('user_version', { simple: true }) === 0) {
        db.pragma(`user_version = ${SCHEMA_VERSION}`);
      }
      return db;
    } catch (error) {
      throw new StateStoreError(`Cannot open state database at ${dbPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  exists(orderId: string, invoiceRef: string): boolean {
    const row = this.query(() =>
      this.db
        .prepare<[string, string], { found: number }>(
          'SELECT 1 AS found FROM processed_invoices WHERE order_id = ? AND invoice_ref = ?'
        )
        .get(orderId, invoiceRef)
    );
    return row !== undefined;
  }

  countForOrder(orderId: string): number {
    const row = this.query(() =>
      this.db
        .prepare<[string], { count: number }>(
          'SELECT COUNT(*) AS count FROM processed_invoices WHERE order_id = ?'
        )
        .get(orderId)
    );
    return row?.count ?? 0;
  }

  refsForOrder(orderId: string): Set<string> {
    const rows = this.query(() =>
      this.db
        .prepare<[string], { invoice_ref: string }>(
          'SELECT invoice_ref FROM processed_invoices WHERE order_id = ?'
        )
        .all(orderId)
    );
    return new Set(rows.map(row => row.invoice_ref));
  }

  /**
   * Commit a delivered invoice. Returns false when the key was already recorded.
   */
  record(input: RecordInput, now: Date = new Date()): boolean {
    const { destination } = input;
    const result = this.query(() =>
      this.db
        .prepare(
          `INSERT OR IGNORE INTO processed_invoices
             (order_id, invoice_ref, invoice_url, delivered_local, local_path,
              delivered_remote, remote_id, processed_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          input.orderId,
          input.invoiceRef,
          input.invoiceUrl,
          destination.localPath ? 1 : 0,
          destination.localPath ?? null,
          destination.remoteId ? 1 : 0,
          destination.remoteId ?? null,
          now.toISOString()
        )
    );
    return result.changes > 0;
  }

  list(): ProcessedInvoice[] {
    const rows = this.query(() =>
      this.db
        .prepare<[], ProcessedInvoiceRow>(
          'SELECT * FROM processed_invoices ORDER BY processed_at, order_id, invoice_ref'
        )
        .all()
    );
    return rows.map(row => ({
      orderId: row.order_id,
      invoiceRef: row.invoice_ref,
      invoiceUrl: row.invoice_url,
      deliveredLocal: row.delivered_local === 1,
      localPath: row.local_path,
      deliveredRemote: row.delivered_remote === 1,
      remoteId: row.remote_id,
      processedAt: row.processed_at,
    }));
  }

  stats(): LedgerStats {
    const row = this.query(() =>
      this.db
        .prepare<[], StatsRow>(
          `SELECT COUNT(DISTINCT order_id) AS orders,
                  COUNT(*) AS invoices,
                  SUM(delivered_local) AS delivered_local,
                  SUM(delivered_remote) AS delivered_remote
             FROM processed_invoices`
        )
        .get()
    );
    return {
      orders: row?.orders ?? 0,
      invoices: row?.invoices ?? 0,
      deliveredLocal: row?.delivered_local ?? 0,
      deliveredRemote: row?.delivered_remote ?? 0,
    };
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private query<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      throw new StateStoreError(`State database error: ${errorMessage(error)}`, { cause: error });
    }
  }
}

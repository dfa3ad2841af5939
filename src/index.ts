#!/usr/bin/env node

import { Command } from 'commander';
import { Collector, summaryExitCode } from './collector';
import { buildCollectorConfig, CollectCliOptions, CollectorConfig, DEFAULT_DB_PATH } from './config';
import { AuthenticationError, ConfigurationError, StateStoreError, errorMessage } from './errors';
import { InvoiceStateStore } from './modules/state/InvoiceStateStore';
import { SinkDispatcher } from './modules/sinks/SinkDispatcher';
import { LocalFileSink } from './modules/sinks/LocalFileSink';
import { PaperlessUploader } from './modules/sinks/PaperlessUploader';
import { InvoiceSink } from './modules/sinks/types';
import { openStorefrontSession } from './modules/storefront/StorefrontSession';
import { AppLogger } from './utils/logger';
import { formatRemaining, runOnSchedule } from './utils/schedule';

export function buildSinks(config: CollectorConfig): InvoiceSink[] {
  const sinks: InvoiceSink[] = [];
  if (config.outputFolder) {
    sinks.push(new LocalFileSink(config.outputFolder));
  }
  if (config.paperless) {
    sinks.push(new PaperlessUploader(config.paperless));
  }
  return sinks;
}

/**
 * One collection run against its own ledger connection. Resolves with the exit code.
 */
async function runOnce(config: CollectorConfig, register: (collector: Collector) => void): Promise<number> {
  const dispatcher = new SinkDispatcher(buildSinks(config));
  const store = new InvoiceStateStore(config.dbPath);

  try {
    const collector = new Collector({
      config,
      store,
      dispatcher,
      openSession: () =>
        openStorefrontSession(
          { headless: config.headless, executablePath: config.chromePath },
          config.storefront
        ),
    });
    register(collector);

    const summary = await collector.run();
    return summaryExitCode(summary);
  } finally {
    store.close();
  }
}

function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigurationError) {
    return 2;
  }
  return 1;
}

const program = new Command();

program
  .name('order-invoice-archiver')
  .description('Archive storefront order invoices to a local folder and/or Paperless-ngx')
  .version('1.0.0');

program
  .command('collect')
  .description('Collect new invoices from the order history')
  .option('--email <email>', 'Storefront account email (or STOREFRONT_EMAIL)')
  .option('--password <password>', 'Storefront account password (or STOREFRONT_PASSWORD)')
  .option('--min-year <year>', 'Scan every year from this one to the current year')
  .option('--output-folder <dir>', 'Save invoices into this directory')
  .option('--db-path <path>', `Processed-invoice database (or INVOICE_DB_PATH, default ${DEFAULT_DB_PATH})`)
  .option('--paperless-url <url>', 'Paperless-ngx base URL (or PAPERLESS_URL)')
  .option('--paperless-token <token>', 'Paperless-ngx API token (or PAPERLESS_TOKEN)')
  .option('--paperless-correspondent <id>', 'Paperless correspondent id')
  .option('--paperless-document-type <id>', 'Paperless document type id')
  .option('--paperless-tags <ids...>', 'Paperless tag ids')
  .option('--paperless-storage-path <id>', 'Paperless storage path id')
  .option('--login-retries <count>', 'Sign-in retries after the first attempt (0-3)')
  .option('--headless', 'Run the browser without a window (default)')
  .option('--no-headless', 'Show the browser window')
  .option('--schedule <interval>', 'Repeat the run every interval, e.g. 1h, 24h or 7d')
  .action(async (options: CollectCliOptions) => {
    let config: CollectorConfig;
    try {
      config = buildCollectorConfig(options);
    } catch (error) {
      AppLogger.error(`Invalid configuration: ${errorMessage(error)}`);
      process.exitCode = exitCodeFor(error);
      return;
    }

    let stopping = false;
    let current: Collector | null = null;
    const onSignal = (signal: NodeJS.Signals): void => {
      AppLogger.info(`[CLI] Received ${signal}, shutting down...`);
      stopping = true;
      current?.requestStop();
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    const register = (collector: Collector): void => {
      current = collector;
      if (stopping) {
        collector.requestStop();
      }
    };

    try {
      if (config.scheduleMs === undefined) {
        process.exitCode = await runOnce(config, register);
        return;
      }

      AppLogger.info(`[CLI] Scheduled mode: running every ${config.schedule}`);
      const runs = await runOnSchedule(
        async runNumber => {
          AppLogger.info(`[CLI] Scheduled run #${runNumber}`);
          const code = await runOnce(config, register);
          if (code !== 0) {
            AppLogger.warn(`[CLI] Run #${runNumber} processed none of its invoices`);
          }
        },
        {
          intervalMs: config.scheduleMs,
          shouldStop: () => stopping,
          onWaiting: remaining => AppLogger.debug(`[CLI] Next run in ${formatRemaining(remaining)}`),
          onError: (error, runNumber) => {
            // Rejected credentials and ledger failures end the schedule
            if (
              error instanceof StateStoreError ||
              (error instanceof AuthenticationError && !error.retryable)
            ) {
              throw error;
            }
            AppLogger.error(`[CLI] Run #${runNumber} failed`, error);
          },
        }
      );
      AppLogger.info(`[CLI] Schedule stopped after ${runs} run(s)`);
    } catch (error) {
      AppLogger.error('Collection failed', error);
      process.exitCode = exitCodeFor(error);
    } finally {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    }
  });

program
  .command('status')
  .description('Show processed-invoice statistics')
  .option('--db-path <path>', `Processed-invoice database (or INVOICE_DB_PATH, default ${DEFAULT_DB_PATH})`)
  .option('--list', 'List every processed invoice')
  .action((options: { dbPath?: string; list?: boolean }) => {
    const dbPath = options.dbPath || process.env.INVOICE_DB_PATH || DEFAULT_DB_PATH;
    let store: InvoiceStateStore;
    try {
      store = new InvoiceStateStore(dbPath);
    } catch (error) {
      AppLogger.error('Cannot read the ledger', error);
      process.exitCode = 1;
      return;
    }

    try {
      const stats = store.stats();
      console.log(`Database:   ${dbPath}`);
      console.log(`Orders:     ${stats.orders}`);
      console.log(`Invoices:   ${stats.invoices}`);
      console.log(`Local:      ${stats.deliveredLocal}`);
      console.log(`Paperless:  ${stats.deliveredRemote}`);

      if (options.list) {
        console.log('');
        for (const row of store.list()) {
          const destinations = [
            row.deliveredLocal ? `local=${row.localPath ?? ''}` : null,
            row.deliveredRemote ? `paperless=${row.remoteId ?? ''}` : null,
          ].filter((entry): entry is string => entry !== null);
          console.log(`${row.processedAt}  ${row.orderId}  ${row.invoiceRef}  ${destinations.join(' ')}`);
        }
      }
    } finally {
      store.close();
    }
  });

if (require.main === module) {
  program.parseAsync(process.argv).catch(error => {
    AppLogger.error('Unexpected error', error);
    process.exitCode = 1;
  });
}

export { program };

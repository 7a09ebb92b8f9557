#!/usr/bin/env node
/**
 * Signalpost CLI
 *
 * Commands:
 * - signalpost start                           Run the alert scheduler and delivery worker
 * - signalpost queue-status [--tenant <id>]    Delivery queue counts by status
 * - signalpost retry-failed <tenant> <entryId> Re-queue a failed delivery
 * - signalpost sign <secret> <body>            Compute a webhook signature
 */

import { Command } from 'commander';
import { createPipeline } from '../index';
import { createDatabase, type Database } from '../db/index';
import { DatabaseLockedError, errorMessage } from '../infra/errors';
import { loadConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { setupShutdownHandlers } from '../utils/production';
import { createDeliveryQueueStore } from '../webhooks/queue';
import { DELIVERY_STATUSES } from '../webhooks/types';
import { signPayload } from '../webhooks/signature';

const program = new Command();

program
  .name('signalpost')
  .description('Threshold alerts over tenant metrics, delivered as signed webhooks')
  .version('0.1.0');

// ============================================================================
// start - run both loops until SIGINT/SIGTERM
// ============================================================================
program
  .command('start')
  .description('Start the alert scheduler and the delivery worker')
  .action(async () => {
    const config = loadConfig();
    const pipeline = await createPipeline(config);
    setupShutdownHandlers(() => pipeline.stop());
    pipeline.start();
    logger.info({ stateDir: config.stateDir, database: config.database.file }, 'Signalpost is running');
  });

// ============================================================================
// queue-status - counts by status
// ============================================================================
program
  .command('queue-status')
  .description('Show delivery queue counts by status')
  .option('-t, --tenant <tenantId>', 'Only count entries of this tenant')
  .action(async (options: { tenant?: string }) => {
    const config = loadConfig();
    // Snapshot read; works while `start` holds the database
    const db = await createDatabase({ file: config.database.file, readOnly: true });
    try {
      const counts = createDeliveryQueueStore(db).countByStatus(options.tenant);
      console.log(`\nDelivery queue${options.tenant ? ` (tenant ${options.tenant})` : ''}\n`);
      for (const status of DELIVERY_STATUSES) {
        console.log(`  ${status.padEnd(11)} ${counts[status]}`);
      }
      console.log('');
    } finally {
      db.close();
    }
  });

// ============================================================================
// retry-failed - operator re-queue
// ============================================================================
program
  .command('retry-failed <tenantId> <entryId>')
  .description('Move a failed delivery back to pending with a fresh attempt budget (stop `start` first)')
  .action(async (tenantId: string, entryId: string) => {
    const config = loadConfig();
    let db: Database;
    try {
      db = await createDatabase({ file: config.database.file });
    } catch (err) {
      if (!(err instanceof DatabaseLockedError)) throw err;
      console.error(`\n  Error: ${err.message}. Stop it before changing the queue.\n`);
      process.exitCode = 1;
      return;
    }
    try {
      const entry = createDeliveryQueueStore(db).retryFailed(tenantId, entryId);
      console.log(`\n  Re-queued ${entry.id} (${entry.eventType} -> webhook ${entry.webhookId})\n`);
    } catch (err) {
      console.error(`\n  Error: ${errorMessage(err)}\n`);
      process.exitCode = 1;
    } finally {
      db.close();
    }
  });

// ============================================================================
// sign - receiver debugging
// ============================================================================
program
  .command('sign <secret> <body>')
  .description('Print the signature header value for a body')
  .action((secret: string, body: string) => {
    console.log(signPayload(secret, body));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.error({ err }, 'Command failed');
  process.exit(1);
});

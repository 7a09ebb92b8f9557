/**
 * Delivery Queue Store - durable outbound webhook attempts
 *
 * Lifecycle: pending -> processing -> delivered | pending (retry) | failed.
 *
 * Every transition is a conditional UPDATE that names the state it leaves;
 * a transition that matches zero rows lost a race or was invalid. The claim
 * in particular is a compare-and-set on status = 'pending', so two workers
 * racing for one entry produce exactly one winner.
 */

import type { Database, Row } from '../db/index';
import { readNumber, readOptionalString, readString } from '../db/rows';
import { NotFoundError, QueueTransitionError } from '../infra/errors';
import { generateId } from '../utils/id';
import { systemClock, type Clock } from '../utils/clock';
import { createLogger } from '../utils/logger';
import {
  DEFAULT_MAX_ATTEMPTS,
  DELIVERY_STATUSES,
  type DeliveryQueueEntry,
  type DeliveryStatus,
  type EventEnvelope,
} from './types';

const logger = createLogger('delivery-queue');

// =============================================================================
// TYPES
// =============================================================================

export interface EnqueueInput {
  webhookId: string;
  tenantId: string;
  eventType: string;
  payload: EventEnvelope;
  /** Default: 5 */
  maxAttempts?: number;
}

export interface FailureOutcome {
  status: 'pending' | 'failed';
  attempts: number;
  /** When the entry becomes claimable again; null once failed */
  nextRetryAt: number | null;
}

export interface QueueListFilter {
  tenantId: string;
  webhookId?: string;
  status?: DeliveryStatus;
  limit?: number;
}

export interface DeliveryQueueStore {
  /** Insert a pending entry, due immediately. */
  enqueue(input: EnqueueInput): DeliveryQueueEntry;

  /** Atomically move one due pending entry to processing. True only for the winner. */
  claim(entryId: string): boolean;

  /** Claim up to `limit` due entries, oldest due first. Returns only the entries won. */
  claimBatch(limit: number): DeliveryQueueEntry[];

  /** processing -> delivered */
  markDelivered(entryId: string): void;

  /**
   * processing -> pending with attempts + 1 and a pushed-back nextRetryAt, or
   * processing -> failed once attempts reaches maxAttempts. `delayFor`
   * receives the attempt count before this failure.
   */
  recordFailure(entryId: string, error: string, delayFor: (attemptsBefore: number) => number): FailureOutcome;

  /** processing -> failed without further retries (target gone or disabled). */
  markFailed(entryId: string, error: string): void;

  /** processing -> pending for an entry that was claimed but never sent; attempts unchanged. */
  release(entryId: string): void;

  get(entryId: string): DeliveryQueueEntry | undefined;
  list(filter: QueueListFilter): DeliveryQueueEntry[];
  countByStatus(tenantId?: string): Record<DeliveryStatus, number>;

  /** Return processing entries untouched for `olderThanMs` to pending. */
  releaseStale(olderThanMs: number): number;

  /** Operator re-queue of a failed entry: pending, attempts reset, due now. */
  retryFailed(tenantId: string, entryId: string): DeliveryQueueEntry;
}

// =============================================================================
// ROW PARSER
// =============================================================================

function parseStatus(value: string): DeliveryStatus {
  const status = DELIVERY_STATUSES.find((s) => s === value);
  if (!status) throw new Error(`unknown delivery status: ${value}`);
  return status;
}

function parseEntryRow(row: Row): DeliveryQueueEntry {
  return {
    id: readString(row, 'id'),
    webhookId: readString(row, 'webhook_id'),
    tenantId: readString(row, 'tenant_id'),
    eventType: readString(row, 'event_type'),
    payload: readString(row, 'payload'),
    attempts: readNumber(row, 'attempts'),
    maxAttempts: readNumber(row, 'max_attempts'),
    nextRetryAt: readNumber(row, 'next_retry_at'),
    status: parseStatus(readString(row, 'status')),
    lastError: readOptionalString(row, 'last_error'),
    createdAt: readNumber(row, 'created_at'),
    updatedAt: readNumber(row, 'updated_at'),
  };
}

const COLUMNS = `id, webhook_id, tenant_id, event_type, payload, attempts, max_attempts,
  next_retry_at, status, last_error, created_at, updated_at`;

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export function createDeliveryQueueStore(db: Database, options: { now?: Clock } = {}): DeliveryQueueStore {
  const now = options.now ?? systemClock;

  function requireEntry(entryId: string): DeliveryQueueEntry {
    const entry = store.get(entryId);
    if (!entry) throw new NotFoundError('queue entry', entryId);
    return entry;
  }

  const store: DeliveryQueueStore = {
    enqueue(input) {
      const timestamp = now();
      const maxAttempts = Math.max(1, Math.floor(input.maxAttempts ?? DEFAULT_MAX_ATTEMPTS));
      const entry: DeliveryQueueEntry = {
        id: generateId('dlv'),
        webhookId: input.webhookId,
        tenantId: input.tenantId,
        eventType: input.eventType,
        payload: JSON.stringify(input.payload),
        attempts: 0,
        maxAttempts,
        nextRetryAt: timestamp,
        status: 'pending',
        lastError: null,
        createdAt: timestamp,
        updatedAt: timestamp,
      };

      db.run(`INSERT INTO webhook_queue (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`, [
        entry.id,
        entry.webhookId,
        entry.tenantId,
        entry.eventType,
        entry.payload,
        entry.attempts,
        entry.maxAttempts,
        entry.nextRetryAt,
        entry.status,
        entry.lastError,
        entry.createdAt,
        entry.updatedAt,
      ]);

      logger.debug({ entryId: entry.id, webhookId: entry.webhookId, eventType: entry.eventType }, 'Delivery enqueued');
      return entry;
    },

    claim(entryId) {
      const timestamp = now();
      const { changes } = db.run(
        `UPDATE webhook_queue
         SET status = 'processing', updated_at = ?
         WHERE id = ? AND status = 'pending' AND next_retry_at <= ?`,
        [timestamp, entryId, timestamp],
      );
      return changes === 1;
    },

    claimBatch(limit) {
      const safeLimit = Math.max(1, Math.floor(limit));
      const candidates = db
        .query(
          `SELECT id FROM webhook_queue
           WHERE status = 'pending' AND next_retry_at <= ?
           ORDER BY next_retry_at ASC, created_at ASC
           LIMIT ?`,
          [now(), safeLimit],
        )
        .map((row) => readString(row, 'id'));

      const claimed: DeliveryQueueEntry[] = [];
      for (const id of candidates) {
        if (!store.claim(id)) continue;
        const entry = store.get(id);
        if (entry) claimed.push(entry);
      }

      if (claimed.length > 0) {
        logger.debug({ candidates: candidates.length, claimed: claimed.length }, 'Claimed deliveries');
      }
      return claimed;
    },

    markDelivered(entryId) {
      const { changes } = db.run(
        `UPDATE webhook_queue SET status = 'delivered', updated_at = ? WHERE id = ? AND status = 'processing'`,
        [now(), entryId],
      );
      if (changes === 0) {
        throw new QueueTransitionError(entryId, 'processing', store.get(entryId)?.status ?? null);
      }
    },

    recordFailure(entryId, error, delayFor) {
      const entry = requireEntry(entryId);
      if (entry.status !== 'processing') {
        throw new QueueTransitionError(entryId, 'processing', entry.status);
      }

      const timestamp = now();
      const attempts = entry.attempts + 1;

      if (attempts >= entry.maxAttempts) {
        const { changes } = db.run(
          `UPDATE webhook_queue
           SET status = 'failed', attempts = ?, last_error = ?, updated_at = ?
           WHERE id = ? AND status = 'processing' AND attempts = ?`,
          [attempts, error, timestamp, entryId, entry.attempts],
        );
        if (changes === 0) {
          throw new QueueTransitionError(entryId, 'processing', store.get(entryId)?.status ?? null);
        }
        return { status: 'failed', attempts, nextRetryAt: null };
      }

      const nextRetryAt = timestamp + Math.max(0, delayFor(entry.attempts));
      const { changes } = db.run(
        `UPDATE webhook_queue
         SET status = 'pending', attempts = ?, next_retry_at = ?, last_error = ?, updated_at = ?
         WHERE id = ? AND status = 'processing' AND attempts = ?`,
        [attempts, nextRetryAt, error, timestamp, entryId, entry.attempts],
      );
      if (changes === 0) {
        throw new QueueTransitionError(entryId, 'processing', store.get(entryId)?.status ?? null);
      }
      return { status: 'pending', attempts, nextRetryAt };
    },

    markFailed(entryId, error) {
      const { changes } = db.run(
        `UPDATE webhook_queue
         SET status = 'failed', attempts = attempts + 1, last_error = ?, updated_at = ?
         WHERE id = ? AND status = 'processing'`,
        [error, now(), entryId],
      );
      if (changes === 0) {
        throw new QueueTransitionError(entryId, 'processing', store.get(entryId)?.status ?? null);
      }
    },

    release(entryId) {
      const { changes } = db.run(
        `UPDATE webhook_queue SET status = 'pending', updated_at = ? WHERE id = ? AND status = 'processing'`,
        [now(), entryId],
      );
      if (changes === 0) {
        throw new QueueTransitionError(entryId, 'processing', store.get(entryId)?.status ?? null);
      }
    },

    get(entryId) {
      const rows = db.query(`SELECT ${COLUMNS} FROM webhook_queue WHERE id = ?`, [entryId]);
      return rows.length > 0 ? parseEntryRow(rows[0]) : undefined;
    },

    list(filter) {
      const conditions: string[] = ['tenant_id = ?'];
      const params: Array<string | number> = [filter.tenantId];

      if (filter.webhookId) {
        conditions.push('webhook_id = ?');
        params.push(filter.webhookId);
      }
      if (filter.status) {
        conditions.push('status = ?');
        params.push(filter.status);
      }

      const safeLimit = Math.max(1, Math.min(filter.limit ?? 50, 200));
      params.push(safeLimit);

      return db
        .query(
          `SELECT ${COLUMNS} FROM webhook_queue
           WHERE ${conditions.join(' AND ')}
           ORDER BY created_at DESC, id
           LIMIT ?`,
          params,
        )
        .map(parseEntryRow);
    },

    countByStatus(tenantId) {
      const counts: Record<DeliveryStatus, number> = { pending: 0, processing: 0, delivered: 0, failed: 0 };
      const rows = tenantId
        ? db.query('SELECT status, COUNT(*) AS n FROM webhook_queue WHERE tenant_id = ? GROUP BY status', [tenantId])
        : db.query('SELECT status, COUNT(*) AS n FROM webhook_queue GROUP BY status');
      for (const row of rows) {
        counts[parseStatus(readString(row, 'status'))] = readNumber(row, 'n');
      }
      return counts;
    },

    releaseStale(olderThanMs) {
      const timestamp = now();
      const { changes } = db.run(
        `UPDATE webhook_queue SET status = 'pending', updated_at = ?
         WHERE status = 'processing' AND updated_at <= ?`,
        [timestamp, timestamp - olderThanMs],
      );
      if (changes > 0) {
        logger.warn({ released: changes, olderThanMs }, 'Released stale processing deliveries');
      }
      return changes;
    },

    retryFailed(tenantId, entryId) {
      const timestamp = now();
      const { changes } = db.run(
        `UPDATE webhook_queue
         SET status = 'pending', attempts = 0, next_retry_at = ?, updated_at = ?
         WHERE id = ? AND tenant_id = ? AND status = 'failed'`,
        [timestamp, timestamp, entryId, tenantId],
      );
      if (changes === 0) {
        const entry = store.get(entryId);
        if (!entry || entry.tenantId !== tenantId) throw new NotFoundError('queue entry', entryId);
        throw new QueueTransitionError(entryId, 'failed', entry.status);
      }
      logger.info({ entryId, tenantId }, 'Failed delivery re-queued');
      return requireEntry(entryId);
    },
  };

  return store;
}

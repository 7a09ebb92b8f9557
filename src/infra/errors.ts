/**
 * Domain errors shared by the alert and delivery modules.
 */

import type { NotificationReport } from '../alerts/types';
import { NonRetryableError } from './retry';

/** Input rejected at creation or update time. */
export class ValidationError extends NonRetryableError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class NotFoundError extends NonRetryableError {
  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`);
    this.name = 'NotFoundError';
  }
}

/** A queue entry was asked to move from a state that does not allow it. */
export class QueueTransitionError extends NonRetryableError {
  constructor(entryId: string, expected: string, actual: string | null) {
    super(`queue entry ${entryId} is ${actual ?? 'missing'}, expected ${expected}`);
    this.name = 'QueueTransitionError';
  }
}

/** An alert history entry cannot move to the requested status from its current one. */
export class HistoryTransitionError extends NonRetryableError {
  constructor(historyId: string, target: string, actual: string) {
    super(`alert history ${historyId} is ${actual}, cannot become ${target}`);
    this.name = 'HistoryTransitionError';
  }
}

/** Another live process holds the database file. */
export class DatabaseLockedError extends Error {
  readonly file: string;
  readonly holderPid: number;

  constructor(file: string, holderPid: number) {
    super(`database ${file} is in use by process ${holderPid}`);
    this.name = 'DatabaseLockedError';
    this.file = file;
    this.holderPid = holderPid;
  }
}

/** The metrics source could not produce a value; aborts evaluation of one alert. */
export class MetricLookupError extends Error {
  readonly metricName: string;

  constructor(metricName: string, reason: string) {
    super(`get metric ${metricName}: ${reason}`);
    this.name = 'MetricLookupError';
    this.metricName = metricName;
  }
}

/** Some channels of a triggered alert could not be notified. */
export class NotificationError extends Error {
  readonly failed: number;
  readonly total: number;
  /** Per-channel outcome, including the queue entries of channels that succeeded */
  readonly report: NotificationReport;

  constructor(report: NotificationReport) {
    super(`failed to send ${report.failed}/${report.total} notifications`);
    this.name = 'NotificationError';
    this.failed = report.failed;
    this.total = report.total;
    this.report = report;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Alert Scheduler - periodic evaluation of every enabled alert
 *
 * One alert at a time. A failure on one alert is logged and never stops
 * the rest of the tick.
 */

import { createTickLoop } from '../cron/index';
import { NotificationError } from '../infra/errors';
import { generateId } from '../utils/id';
import { systemClock, type Clock } from '../utils/clock';
import { createLogger } from '../utils/logger';
import type { AlertEngine } from './engine';
import type { Notifier } from './notifier';
import type { AlertStore } from './store';
import type { Alert, AlertHistory } from './types';

const logger = createLogger('alert-scheduler');

export const DEFAULT_ALERT_INTERVAL_MS = 30_000;

export interface AlertSchedulerDeps {
  store: AlertStore;
  engine: AlertEngine;
  notifier: Notifier;
  now?: Clock;
}

export interface AlertSchedulerOptions {
  intervalMs?: number;
  signal?: AbortSignal;
}

export interface AlertTickSummary {
  /** Alerts whose conditions were evaluated */
  evaluated: number;
  skippedCooldown: number;
  triggered: number;
  /** Alerts whose evaluation failed */
  failed: number;
}

export interface AlertScheduler {
  start(): void;
  /** Resolves once the in-flight tick, if any, has finished. */
  stop(): Promise<void>;
  isRunning(): boolean;
  tick(): Promise<AlertTickSummary>;
  /** Alias of tick() for one-shot runs outside the loop. */
  runOnce(): Promise<AlertTickSummary>;
}

export function createAlertScheduler(deps: AlertSchedulerDeps, options: AlertSchedulerOptions = {}): AlertScheduler {
  const now = deps.now ?? systemClock;
  const { store, engine, notifier } = deps;

  async function fire(alert: Alert, history: AlertHistory): Promise<void> {
    try {
      store.saveHistory(history);
    } catch (err) {
      logger.error({ err, alertId: alert.id, tenantId: alert.tenantId }, 'Failed to save alert history');
    }

    try {
      store.updateLastTriggered(alert.id, history.triggeredAt);
    } catch (err) {
      logger.error({ err, alertId: alert.id, tenantId: alert.tenantId }, 'Failed to update last triggered');
    }

    try {
      await notifier.send(alert, history);
    } catch (err) {
      const queued =
        err instanceof NotificationError
          ? err.report.results.flatMap((r) => (r.ok ? [r.entryId] : []))
          : [];
      logger.error({ err, alertId: alert.id, tenantId: alert.tenantId, queued }, 'Failed to send notifications');
    }
  }

  async function tick(): Promise<AlertTickSummary> {
    const summary: AlertTickSummary = { evaluated: 0, skippedCooldown: 0, triggered: 0, failed: 0 };
    const alerts = store.listEnabled();

    for (const alert of alerts) {
      if (!engine.shouldTrigger(alert, now())) {
        summary.skippedCooldown++;
        continue;
      }

      let triggered: boolean;
      let history: AlertHistory;
      try {
        const result = await engine.evaluate(alert);
        summary.evaluated++;
        triggered = result.triggered;
        const triggeredAt = now();
        history = {
          id: generateId('ahist'),
          alertId: alert.id,
          tenantId: alert.tenantId,
          triggeredAt,
          resolvedAt: null,
          status: 'triggered',
          metadata: result.metadata,
          createdAt: triggeredAt,
        };
      } catch (err) {
        summary.failed++;
        logger.error({ err, alertId: alert.id, tenantId: alert.tenantId }, 'Failed to evaluate alert');
        continue;
      }

      if (!triggered) continue;

      summary.triggered++;
      logger.info({ alertId: alert.id, tenantId: alert.tenantId, severity: alert.severity }, 'Alert triggered');
      await fire(alert, history);
    }

    if (alerts.length > 0) {
      logger.debug({ ...summary, alerts: alerts.length }, 'Alert tick complete');
    }
    return summary;
  }

  const loop = createTickLoop({
    name: 'alert-scheduler',
    intervalMs: options.intervalMs ?? DEFAULT_ALERT_INTERVAL_MS,
    signal: options.signal,
    tick: () => tick(),
  });

  return {
    start: () => loop.start(),
    stop: () => loop.stop(),
    isRunning: () => loop.isRunning(),
    tick,
    runOnce: tick,
  };
}

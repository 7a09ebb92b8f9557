export * from './types';
export { createAlertEngine, evaluateCondition, combineConditions, shouldTrigger } from './engine';
export type { AlertEngine, EvaluableAlert } from './engine';
export { createAlertStore } from './store';
export type { AlertStore } from './store';
export { validateAlertInput } from './validation';
export type { CreateAlertInput, AlertPatch } from './validation';
export { createNotifier, ALERT_TRIGGERED_EVENT } from './notifier';
export type { Notifier, AlertTriggeredData } from './notifier';
export { createAlertScheduler, DEFAULT_ALERT_INTERVAL_MS } from './scheduler';
export type { AlertScheduler, AlertTickSummary } from './scheduler';

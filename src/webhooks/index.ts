export * from './types';
export { createWebhookStore, generateSecret, WILDCARD_EVENT } from './store';
export type { WebhookStore, CreateWebhookInput } from './store';
export { createDeliveryQueueStore } from './queue';
export type { DeliveryQueueStore, EnqueueInput, FailureOutcome, QueueListFilter } from './queue';
export { createDispatcher } from './dispatcher';
export type { Dispatcher, DispatchRequest, DispatchResult, FetchLike } from './dispatcher';
export { createDeliveryWorker, DEFAULT_WORKER_CONFIG } from './worker';
export type { DeliveryWorker, DeliveryWorkerConfig, DeliveryTickSummary } from './worker';
export { createEventPublisher, buildEnvelope } from './events';
export type { EventPublisher } from './events';
export { signPayload, verifySignature, SIGNATURE_HEADER, EVENT_HEADER, DELIVERY_HEADER } from './signature';

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createMemoryDatabase, type Database } from '../db/index';
import { createDispatcher, type FetchLike } from './dispatcher';
import { createDeliveryQueueStore, type DeliveryQueueStore } from './queue';
import { createWebhookStore, type WebhookStore } from './store';
import { createDeliveryWorker, type DeliveryWorker } from './worker';
import type { Webhook } from './types';

const NOW = 1_700_000_000_000;

describe('DeliveryWorker', () => {
  let db: Database;
  let clock: number;
  let webhooks: WebhookStore;
  let queue: DeliveryQueueStore;
  let webhook: Webhook;
  let workers: DeliveryWorker[];

  beforeEach(async () => {
    clock = NOW;
    db = await createMemoryDatabase();
    webhooks = createWebhookStore(db, { now: () => clock });
    queue = createDeliveryQueueStore(db, { now: () => clock });
    webhook = webhooks.create({
      tenantId: 'tenant-1',
      name: 'Ops hook',
      url: 'https://hooks.example.com/ops',
      events: ['*'],
    });
    workers = [];
  });

  afterEach(async () => {
    await Promise.all(workers.map((w) => w.stop()));
    db.close();
  });

  function workerWith(fetch: FetchLike): DeliveryWorker {
    const worker = createDeliveryWorker(
      { queue, webhooks, dispatcher: createDispatcher({ timeoutMs: 1_000, fetch }), now: () => clock },
      { intervalMs: 1_000, batchSize: 10, baseDelayMs: 1_000, maxDelayMs: 60_000, staleAfterMs: 300_000 },
    );
    workers.push(worker);
    return worker;
  }

  function enqueue(webhookId = webhook.id, maxAttempts?: number) {
    return queue.enqueue({
      webhookId,
      tenantId: 'tenant-1',
      eventType: 'alert.triggered',
      payload: { type: 'alert.triggered', tenant_id: 'tenant-1', timestamp: new Date(NOW).toISOString(), data: {} },
      maxAttempts,
    });
  }

  const ok: FetchLike = async () => new Response('ok', { status: 200 });
  const serverError: FetchLike = async () => new Response('down', { status: 500 });

  it('delivers a due entry and stamps the webhook', async () => {
    const entry = enqueue();
    const fetch = vi.fn(ok);

    const summary = await workerWith(fetch).tick();

    expect(summary).toEqual({ claimed: 1, delivered: 1, retried: 0, failed: 0, released: 0, errors: 0 });
    expect(queue.get(entry.id)?.status).toBe('delivered');
    expect(webhooks.getById(webhook.id)?.lastTriggeredAt).toBe(NOW);
    expect(fetch.mock.calls[0][1].body).toBe(entry.payload);
  });

  it('schedules a retry with backoff after a failed attempt', async () => {
    const entry = enqueue();

    const summary = await workerWith(serverError).tick();

    expect(summary.retried).toBe(1);
    const after = queue.get(entry.id);
    expect(after?.status).toBe('pending');
    expect(after?.attempts).toBe(1);
    expect(after?.nextRetryAt).toBe(NOW + 1_000);
    expect(after?.lastError).toBe('HTTP 500: down');
  });

  it('waits for the retry time before trying again', async () => {
    enqueue();
    const fetch = vi.fn(serverError);
    const worker = workerWith(fetch);

    await worker.tick();
    expect((await worker.tick()).claimed).toBe(0);

    clock = NOW + 1_000;
    expect((await worker.tick()).claimed).toBe(1);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('fails an entry once its attempts are used up', async () => {
    const entry = enqueue(webhook.id, 2);
    const worker = workerWith(serverError);

    await worker.tick();
    clock = NOW + 1_000;
    const summary = await worker.tick();

    expect(summary.failed).toBe(1);
    expect(queue.get(entry.id)?.status).toBe('failed');
    expect(queue.get(entry.id)?.attempts).toBe(2);
  });

  it('fails entries whose webhook is gone or disabled without sending', async () => {
    const orphan = enqueue('wh_missing');
    const disabled = webhooks.create({
      tenantId: 'tenant-1',
      name: 'Paused hook',
      url: 'https://hooks.example.com/paused',
      events: ['*'],
    });
    webhooks.setEnabled('tenant-1', disabled.id, false);
    const paused = enqueue(disabled.id);
    const fetch = vi.fn(ok);

    const summary = await workerWith(fetch).tick();

    expect(summary).toEqual({ claimed: 2, delivered: 0, retried: 0, failed: 2, released: 0, errors: 0 });
    expect(fetch).not.toHaveBeenCalled();
    expect(queue.get(orphan.id)?.lastError).toBe('webhook not found');
    expect(queue.get(paused.id)?.lastError).toBe('webhook disabled');
  });

  it('does not deliver to a webhook owned by another tenant', async () => {
    const foreign = webhooks.create({
      tenantId: 'tenant-2',
      name: 'Foreign hook',
      url: 'https://hooks.example.com/foreign',
      events: ['*'],
    });
    const entry = enqueue(foreign.id);
    const fetch = vi.fn(ok);

    await workerWith(fetch).tick();

    expect(fetch).not.toHaveBeenCalled();
    expect(queue.get(entry.id)?.status).toBe('failed');
  });

  it('isolates failures between entries of one batch', async () => {
    const other = webhooks.create({
      tenantId: 'tenant-1',
      name: 'Flaky hook',
      url: 'https://flaky.example.com/hook',
      events: ['*'],
    });
    const failing = enqueue(other.id);
    const good = enqueue();
    const fetch: FetchLike = async (url) =>
      url.startsWith('https://flaky') ? new Response('', { status: 503 }) : new Response('ok', { status: 200 });

    const summary = await workerWith(fetch).tick();

    expect(summary).toEqual({ claimed: 2, delivered: 1, retried: 1, failed: 0, released: 0, errors: 0 });
    expect(queue.get(failing.id)?.status).toBe('pending');
    expect(queue.get(good.id)?.status).toBe('delivered');
  });

  it('delivers each entry exactly once across concurrent workers', async () => {
    const ids = [enqueue().id, enqueue().id, enqueue().id, enqueue().id, enqueue().id];
    const fetch = vi.fn(ok);

    const [a, b] = await Promise.all([workerWith(fetch).tick(), workerWith(fetch).tick()]);

    expect(a.delivered + b.delivered).toBe(5);
    expect(a.claimed + b.claimed).toBe(5);
    expect(fetch).toHaveBeenCalledTimes(5);
    const deliveryIds = fetch.mock.calls.map(([, init]) => new Headers(init.headers).get('X-Signalpost-Delivery'));
    expect([...deliveryIds].sort()).toEqual([...ids].sort());
    expect(queue.countByStatus()).toEqual({ pending: 0, processing: 0, delivered: 5, failed: 0 });
  });

  it('does not claim anything once cancelled', async () => {
    const entry = enqueue();
    const controller = new AbortController();
    controller.abort();
    const fetch = vi.fn(ok);

    const summary = await workerWith(fetch).tick(controller.signal);

    expect(summary).toEqual({ claimed: 0, delivered: 0, retried: 0, failed: 0, released: 0, errors: 0 });
    expect(fetch).not.toHaveBeenCalled();
    expect(queue.get(entry.id)?.status).toBe('pending');
  });

  it('returns unsent entries to pending without spending an attempt when cancelled mid-batch', async () => {
    enqueue(webhook.id, 1);
    enqueue(webhook.id, 1);
    enqueue(webhook.id, 1);
    const controller = new AbortController();
    const fetch = vi.fn(async () => {
      controller.abort();
      return new Response('ok', { status: 200 });
    });

    const summary = await workerWith(fetch).tick(controller.signal);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(summary).toEqual({ claimed: 3, delivered: 1, retried: 0, failed: 0, released: 2, errors: 0 });
    expect(queue.countByStatus()).toEqual({ pending: 2, processing: 0, delivered: 1, failed: 0 });
    const pending = queue.list({ tenantId: 'tenant-1', status: 'pending' });
    expect(pending.map((e) => [e.attempts, e.lastError])).toEqual([
      [0, null],
      [0, null],
    ]);
  });

  it('releases stale processing entries at the start of a tick', async () => {
    const entry = enqueue();
    queue.claim(entry.id);
    clock = NOW + 300_000;
    const fetch = vi.fn(ok);

    const summary = await workerWith(fetch).tick();

    expect(summary.delivered).toBe(1);
    expect(queue.get(entry.id)?.status).toBe('delivered');
  });

  it('recovers an entry left in processing by a store error on a later tick', async () => {
    const entry = enqueue();
    let broken = true;
    const flaky: WebhookStore = {
      ...webhooks,
      getById: (id) => {
        if (broken) {
          broken = false;
          throw new Error('database is busy');
        }
        return webhooks.getById(id);
      },
    };
    const worker = createDeliveryWorker(
      { queue, webhooks: flaky, dispatcher: createDispatcher({ timeoutMs: 1_000, fetch: ok }), now: () => clock },
      { intervalMs: 1_000, batchSize: 10, baseDelayMs: 1_000, maxDelayMs: 60_000, staleAfterMs: 30_000 },
    );
    workers.push(worker);

    expect(await worker.tick()).toEqual({ claimed: 1, delivered: 0, retried: 0, failed: 0, released: 0, errors: 1 });
    expect(queue.get(entry.id)?.status).toBe('processing');

    clock = NOW + 30_000;
    expect((await worker.tick()).delivered).toBe(1);
    expect(queue.get(entry.id)?.status).toBe('delivered');
    expect(queue.get(entry.id)?.attempts).toBe(0);
  });
});

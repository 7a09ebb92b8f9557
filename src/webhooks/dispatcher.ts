/**
 * Webhook Dispatcher - one signed HTTP POST per delivery attempt
 *
 * Every outcome other than a 2xx response becomes a DeliveryError: non-2xx
 * status, timeout, cancellation through the caller's signal, or a network
 * failure. Retrying is the worker's decision, not the dispatcher's.
 */

import { DeliveryError } from '../infra/retry';
import { errorMessage } from '../infra/errors';
import { createLogger } from '../utils/logger';
import { DELIVERY_HEADER, EVENT_HEADER, SIGNATURE_HEADER, signPayload } from './signature';

const logger = createLogger('webhook-dispatcher');

/** Maximum characters of a failed response body kept in last_error */
const ERROR_BODY_LIMIT = 300;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface DispatchRequest {
  url: string;
  secret: string;
  eventType: string;
  deliveryId: string;
  /** Raw JSON body; the signature covers exactly these bytes */
  body: string;
}

export interface DispatchResult {
  status: number;
  durationMs: number;
}

export interface DispatcherOptions {
  timeoutMs: number;
  userAgent?: string;
  fetch?: FetchLike;
}

export interface Dispatcher {
  dispatch(request: DispatchRequest, signal?: AbortSignal): Promise<DispatchResult>;
}

async function readSnippet(response: Response): Promise<string> {
  const text = await response.text().catch(() => '');
  return text.slice(0, ERROR_BODY_LIMIT);
}

export function createDispatcher(options: DispatcherOptions): Dispatcher {
  const doFetch: FetchLike = options.fetch ?? ((url, init) => fetch(url, init));
  const userAgent = options.userAgent ?? 'Signalpost-Webhook/1.0';

  return {
    async dispatch(request, signal) {
      if (signal?.aborted) {
        throw new DeliveryError('delivery cancelled before sending');
      }

      const controller = new AbortController();
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, options.timeoutMs);
      const onAbort = (): void => controller.abort();
      signal?.addEventListener('abort', onAbort, { once: true });

      const started = Date.now();
      try {
        let response: Response;
        try {
          response = await doFetch(request.url, {
            method: 'POST',
            headers: {
              'Content-Type': 'application/json',
              'User-Agent': userAgent,
              [SIGNATURE_HEADER]: signPayload(request.secret, request.body),
              [EVENT_HEADER]: request.eventType,
              [DELIVERY_HEADER]: request.deliveryId,
            },
            body: request.body,
            signal: controller.signal,
            redirect: 'manual',
          });
        } catch (err) {
          if (timedOut) {
            throw new DeliveryError(`request timed out after ${options.timeoutMs}ms`);
          }
          if (signal?.aborted) {
            throw new DeliveryError('delivery cancelled');
          }
          throw new DeliveryError(`request failed: ${errorMessage(err)}`);
        }

        const durationMs = Date.now() - started;

        if (response.status < 200 || response.status >= 300) {
          const snippet = await readSnippet(response);
          logger.debug({ deliveryId: request.deliveryId, status: response.status, durationMs }, 'Webhook rejected');
          throw new DeliveryError(
            snippet ? `HTTP ${response.status}: ${snippet}` : `HTTP ${response.status}`,
            response.status,
          );
        }

        // Drain so the connection can be reused
        await readSnippet(response);
        return { status: response.status, durationMs };
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      }
    },
  };
}

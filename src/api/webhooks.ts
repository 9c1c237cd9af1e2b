import { Hono } from 'hono';
import type { EventIngestionService } from '../ingestion/processor.js';
import {
  InvalidSignatureError,
  MalformedPayloadError,
  RetryableIngestionError,
} from '../ingestion/errors.js';
import { SIGNATURE_HEADER } from '../ingestion/signature.js';
import { createChildLogger } from '../config/logger.js';

const log = createChildLogger('webhook-api');

const RETRY_AFTER_SECONDS = '30';

/**
 * Provider webhook receiver.
 *
 *   POST /webhooks/provider
 *
 * Events are applied inline. A 2xx tells the provider to stop
 * redelivering, so only outcomes that redelivery cannot change get one.
 */
export function createWebhookRoutes(ingestion: EventIngestionService) {
  const app = new Hono();

  app.post('/provider', async (c) => {
    const startTime = Date.now();
    const rawBody = await c.req.text();

    try {
      const result = await ingestion.ingest(rawBody, c.req.header(SIGNATURE_HEADER));
      log.info({ ...result, elapsedMs: Date.now() - startTime }, 'Provider event handled');
      return c.json({ ok: true, ...result });
    } catch (err) {
      if (err instanceof InvalidSignatureError) {
        log.warn({ reason: err.message }, 'Webhook signature verification failed');
        return c.json({ error: 'invalid_signature' }, 401);
      }
      if (err instanceof MalformedPayloadError) {
        log.warn({ reason: err.message, issues: err.issues }, 'Malformed provider event');
        return c.json({ error: 'malformed_payload', message: err.message, issues: err.issues }, 400);
      }
      if (err instanceof RetryableIngestionError) {
        log.warn({ eventId: err.eventId, reason: err.reason }, 'Provider event deferred for redelivery');
        c.header('Retry-After', RETRY_AFTER_SECONDS);
        return c.json({ error: 'retry_later', reason: err.reason }, 503);
      }
      log.error({ err }, 'Provider event processing error');
      c.header('Retry-After', RETRY_AFTER_SECONDS);
      return c.json({ error: 'retry_later', reason: 'internal_error' }, 503);
    }
  });

  return app;
}

/**
 * Hono application factory.
 *
 * Kept apart from the server bootstrap in main.ts so tests can drive the
 * routes with `app.request()` without opening a port.
 */

import { Hono } from 'hono';
import type { EventDispatcher } from './dispatcher/index.js';
import { logger as rootLogger, type Logger } from './shared/logger.js';

export interface AppDependencies {
  dispatcher: Pick<EventDispatcher, 'handle'>;
  logger?: Logger;
}

export function createApp({ dispatcher, logger = rootLogger }: AppDependencies): Hono {
  const app = new Hono();

  app.get('/health', c => c.json({ status: 'ok' }));

  app.post('/webhook', async c => {
    // The signature covers the exact bytes GitHub sent
    const rawBody = Buffer.from(await c.req.arrayBuffer());
    const result = await dispatcher.handle(
      rawBody,
      c.req.header('X-Hub-Signature-256'),
      c.req.header('X-GitHub-Delivery')
    );
    return c.json(result.body, result.status);
  });

  app.notFound(c => c.json({ message: 'Not Found' }, 404));

  app.onError((err, c) => {
    logger.error({ err, path: c.req.path }, 'Unhandled error');
    return c.json({ message: 'Internal Server Error' }, 500);
  });

  return app;
}

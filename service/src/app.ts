import { setTimeout as sleep } from 'node:timers/promises';
import type { Writable } from 'node:stream';
import fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import { z } from 'zod';
import { READY_MESSAGE } from './config.js';

export const ITEM_COLLECTIONS = ['people', 'planets', 'starships'] as const;

const ItemParamsSchema = z.object({
  itemId: z.string().regex(/^[+-]?\d+$/, 'expected an integer').transform(Number),
});

export interface AppOptions {
  itemLimit: number;
  /** Upper bound of the random per-request delay, in seconds. */
  maxDelay: number;
  logger?: FastifyServerOptions['logger'];
  /** Receives one line per completed request. */
  accessLog?: Writable;
  random?: () => number;
}

/**
 * Build the item service. Every collection behaves the same: ids up to the
 * item limit echo back, anything above is not found.
 */
export function buildApp(options: AppOptions): FastifyInstance {
  const app = fastify({
    logger: options.logger ?? false,
    disableRequestLogging: true,
  });
  const random = options.random ?? Math.random;
  const accessLog = options.accessLog;

  if (accessLog) {
    app.addHook('onResponse', (request, reply, done) => {
      accessLog.write(
        `${request.ip} "${request.method} ${request.url} HTTP/${request.raw.httpVersion}" ${reply.statusCode}\n`,
      );
      done();
    });
  }

  for (const collection of ITEM_COLLECTIONS) {
    app.get(`/${collection}/:itemId`, async (request, reply) => {
      const parsed = ItemParamsSchema.safeParse(request.params);
      if (!parsed.success) {
        return reply.status(422).send({
          detail: `Invalid item id: ${parsed.error.issues.map(issue => issue.message).join(', ')}`,
        });
      }

      const { itemId } = parsed.data;
      if (itemId > options.itemLimit) {
        return reply.status(404).send({ detail: `Item ${itemId} was not found.` });
      }
      if (options.maxDelay > 0) {
        await sleep(random() * options.maxDelay * 1000);
      }
      return { item_id: itemId };
    });
  }

  app.setNotFoundHandler((_request, reply) => {
    reply.status(404).send({ detail: 'Not Found' });
  });

  return app;
}

/**
 * Tells the supervising harness this worker is serving. The marker bypasses
 * the logger so that no log level can hide it.
 */
export function announceReady(app: FastifyInstance, out: Writable = process.stderr): void {
  out.write(`${READY_MESSAGE}\n`);
  app.log.info({ pid: process.pid }, 'Worker ready');
}

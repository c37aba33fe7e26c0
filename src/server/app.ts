/**
 * ticketlink HTTP API using Fastify
 *
 * Read-only view of the ticket table plus detection previews and one-off
 * lookups, for checking a table change without joining a channel.
 */

import Fastify, { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import helmet from '@fastify/helmet';
import { TicketLinkError, errorMessage } from '../core/errors';
import { createLogger } from '../core/logger';
import type { SentLog } from '../core/db';
import type { TicketRegistry } from '../core/registry';

const log = createLogger('server');

export interface ServerConfig {
  port: number;
  host: string;
  registry: TicketRegistry;
  /** Requests per minute per client; default 100 */
  rateLimitMax?: number;
  /** Persistent sent log behind GET /api/sent */
  sentLog?: SentLog;
}

interface ChannelParams {
  channel: string;
}

interface PreviewBody {
  channel: string;
  message: string;
}

interface SentQuery {
  limit?: number;
}

interface LookupQuery {
  provider: string;
  id: string;
}

/**
 * Create and configure the Fastify instance
 * Returns the instance without calling listen() - caller handles startup
 */
export async function createServer(config: ServerConfig): Promise<FastifyInstance> {
  const { registry, sentLog } = config;
  const fastify = Fastify({
    logger: false, // We use Pino logger (src/core/logger.ts) for structured logging
    requestTimeout: 30_000,
  });

  await fastify.register(helmet);

  await fastify.register(rateLimit, {
    max: config.rateLimitMax ?? 100,
    timeWindow: '1 minute',
    errorResponseBuilder: () => ({
      statusCode: 429,
      error: 'Too Many Requests',
      message: 'Rate limit exceeded. Please retry later.',
    }),
  });

  // ========== Health Check ==========

  fastify.get('/health', async () => {
    return { status: 'ok', providers: registry.list().length };
  });

  // ========== Ticket Table ==========

  fastify.get('/api/providers', async () => {
    return {
      providers: registry.list().map(p => ({
        name: p.name,
        prefix: p.prefix ?? null,
        pattern: p.patternSource ?? null,
        channels: p.bindings().map(b => b.channel),
      })),
    };
  });

  fastify.get<{ Params: ChannelParams }>(
    '/api/channels/:channel',
    {
      schema: {
        params: {
          type: 'object',
          properties: { channel: { type: 'string', minLength: 1, maxLength: 200 } },
          required: ['channel'],
        },
      },
    },
    async (request: FastifyRequest<{ Params: ChannelParams }>) => {
      const { channel } = request.params;
      return { channel, rules: registry.describeChannel(channel) };
    },
  );

  fastify.post<{ Body: PreviewBody }>(
    '/api/preview',
    {
      schema: {
        body: {
          type: 'object',
          properties: {
            channel: { type: 'string', minLength: 1, maxLength: 200 },
            message: { type: 'string', maxLength: 2000 },
          },
          required: ['channel', 'message'],
        },
      },
    },
    async (request: FastifyRequest<{ Body: PreviewBody }>) => {
      const { channel, message } = request.body;
      return { channel, matches: registry.preview(channel, message) };
    },
  );

  // ========== Lookups ==========

  fastify.get<{ Querystring: LookupQuery }>(
    '/api/lookup',
    {
      schema: {
        querystring: {
          type: 'object',
          properties: {
            provider: { type: 'string', minLength: 1, maxLength: 200 },
            id: { type: 'string', minLength: 1, maxLength: 200 },
          },
          required: ['provider', 'id'],
        },
      },
    },
    async (request: FastifyRequest<{ Querystring: LookupQuery }>, reply: FastifyReply) => {
      const { provider, id } = request.query;
      try {
        const line = await registry.lookup(provider, id);
        return { provider, id, line };
      } catch (err) {
        if (err instanceof TicketLinkError && err.code === 'NOT_FOUND') {
          return reply.status(404).send({ error: err.message });
        }
        log.warn({ provider, id, err: errorMessage(err) }, 'Lookup failed');
        return reply.status(502).send({ error: `Lookup failed: ${errorMessage(err)}` });
      }
    },
  );

  // ========== Sent Log ==========

  fastify.get<{ Querystring: SentQuery }>(
    '/api/sent',
    {
      schema: {
        querystring: {
          type: 'object',
          properties: { limit: { type: 'integer', minimum: 1, maximum: 500 } },
        },
      },
    },
    async (request: FastifyRequest<{ Querystring: SentQuery }>, reply: FastifyReply) => {
      if (!sentLog) {
        return reply.status(404).send({ error: 'No sent log configured' });
      }
      return { sent: sentLog.recent(request.query.limit ?? 50) };
    },
  );

  return fastify;
}

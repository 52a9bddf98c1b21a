import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { DispatcherStats, ListenerStats } from '../../infrastructure/index.js';

/** Snapshot served by `GET /status`. */
export interface RelayStatus {
  readonly version: string;
  readonly uptimeSeconds: number;
  readonly rules: number;
  readonly defaultTopic: string;
  readonly listener: ListenerStats;
  readonly dispatcher: DispatcherStats;
}

export interface StatusRoutesOptions {
  readonly getStatus: () => RelayStatus;
  /** Healthy when the sink session is established. */
  readonly isHealthy: () => boolean;
}

/**
 * Registers the status routes.
 *
 * GET /status: routing and dispatcher counters
 * GET /health: 200 when the sink is connected, 503 otherwise
 */
async function statusRoutes(fastify: FastifyInstance, options: StatusRoutesOptions): Promise<void> {

  fastify.get(
    '/status',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const status = options.getStatus();
      const healthy = options.isHealthy();

      return reply.status(200).send({
        status: healthy ? 'ok' : 'degraded',
        version: status.version,
        uptime_s: status.uptimeSeconds,
        rules: status.rules,
        default_topic: status.defaultTopic,
        listener: {
          connections_total: status.listener.connectionsTotal,
          connections_active: status.listener.connectionsActive,
        },
        dispatcher: {
          capacity: status.dispatcher.capacity,
          buffered: status.dispatcher.buffered,
          in_flight: status.dispatcher.inFlight,
          waiting: status.dispatcher.waiting,
          sent: status.dispatcher.sent,
          retries: status.dispatcher.retries,
          lost: status.dispatcher.lost,
          connected: status.dispatcher.connected,
          closed: status.dispatcher.closed,
        },
      });
    },
  );

  fastify.get(
    '/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      if (options.isHealthy()) {
        return reply.status(200).send({ status: 'ok' });
      }
      fastify.log.debug('Health check: sink not connected');
      return reply.status(503).send({ status: 'degraded' });
    },
  );
}

export default fp(statusRoutes, {
  name: 'status-routes',
  fastify: '5.x',
});

import Fastify from 'fastify';
import statusRoutes from './status-routes.js';
import type { StatusRoutesOptions } from './status-routes.js';

/**
 * Builds (but does not start) the HTTP status server.
 * No per-request logging.
 */
export function createStatusServer(options: StatusRoutesOptions, logLevel: string = 'info') {
  const fastify = Fastify({
    logger: {
      level: logLevel,
      base: { component: 'status' },
    },
    disableRequestLogging: true,
  });

  // Loaded on ready(), listen() or inject()
  void fastify.register(statusRoutes, options);
  return fastify;
}

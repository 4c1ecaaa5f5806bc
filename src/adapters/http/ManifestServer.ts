import Fastify, { type FastifyInstance } from 'fastify';

import type { ManifestRequest } from '../../application/ServeManifestUseCase';
import type { Logger } from '../../core/services/Logger';

export interface ManifestSource {
  execute(request: ManifestRequest): Promise<string | null>;
}

export interface CreateManifestServerOptions {
  manifests: ManifestSource;
  logger: Logger;
}

interface ManifestQuery {
  dogfood_id?: string | string[];
}

/** Repeated parameters resolve to their last value. */
function lastValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[value.length - 1] : value;
}

export function createManifestServer(options: CreateManifestServerOptions): FastifyInstance {
  const { manifests, logger } = options;
  const app = Fastify({ logger: false, exposeHeadRoutes: false });

  app.get<{ Querystring: ManifestQuery }>('/', async (request, reply) => {
    const dogfoodId = lastValue(request.query.dogfood_id);
    const manifest = await manifests.execute({ dogfoodId: dogfoodId || undefined });
    if (manifest === null) {
      return reply.code(404).send();
    }
    return reply.code(200).type('text/xml').send(manifest);
  });

  app.setNotFoundHandler(async (request, reply) => {
    logger.debug(`No handler for ${request.method} ${request.url}`);
    return reply.code(404).send();
  });

  app.setErrorHandler(async (error, request, reply) => {
    logger.error(`Failed to serve ${request.method} ${request.url}:`, error);
    return reply.code(500).send();
  });

  return app;
}

import Fastify, { type FastifyInstance } from 'fastify';
import sensible from '@fastify/sensible';
import type { Logger } from './logger.js';
import { registerRoutes } from './routes/index.js';
import type { CallbackRouteOptions } from './routes/callback.js';

export async function buildApp(deps: { logger: Logger } & CallbackRouteOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: deps.logger });

  await app.register(sensible);
  await registerRoutes(app, { channelSecret: deps.channelSecret, onAudioMessage: deps.onAudioMessage });

  app.get('/health', async () => ({ ok: true }));

  return app;
}

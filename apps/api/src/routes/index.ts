import type { FastifyInstance } from 'fastify';
import { callbackRoutes, type CallbackRouteOptions } from './callback.js';

export async function registerRoutes(app: FastifyInstance, callback: CallbackRouteOptions) {
  await app.register(callbackRoutes, callback);
}

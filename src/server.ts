import Fastify, { FastifyServerOptions } from 'fastify';
import { createAuthenticate } from './middleware/auth.js';
import { registerApiRoutes } from './api/routes.js';
import { GenerateRouteServices } from './api/generate/handler.js';

export interface BuildServerOptions {
  apiKey: string;
  services: GenerateRouteServices;
  logger?: FastifyServerOptions['logger'];
}

export async function buildServer({ apiKey, services, logger = true }: BuildServerOptions) {
  const server = Fastify({ logger });
  const authenticate = createAuthenticate(apiKey);

  // Add authentication hook for all routes except health check
  server.addHook('onRequest', async (request, reply) => {
    if (request.url === '/health') return;
    return authenticate(request, reply);
  });

  // Health check endpoint
  server.get('/health', async () => {
    return { status: 'ok' };
  });

  await registerApiRoutes(server, services);
  return server;
}

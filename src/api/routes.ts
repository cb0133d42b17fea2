import { FastifyInstance } from 'fastify';
import { registerGenerateRoutes } from './generate/routes.js';
import { GenerateRouteServices } from './generate/handler.js';

export async function registerApiRoutes(server: FastifyInstance, services: GenerateRouteServices) {
  // Register generation API routes under /api/generate
  await server.register(async function (fastify) {
    await registerGenerateRoutes(fastify, services);
  }, { prefix: '/api/generate' });
}

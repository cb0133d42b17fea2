import { FastifyInstance } from 'fastify';
import { zodToJsonSchema } from 'zod-to-json-schema';
import {
  GenerateRouteServices,
  createGenerateGameHandler,
  createGenerateRulesHandler,
} from './handler.js';
import {
  GenerateGameRequestSchema,
  GenerateRulesRequestSchema,
  GenerateRulesResponseSchema,
} from './schemas.js';

export async function registerGenerateRoutes(server: FastifyInstance, services: GenerateRouteServices) {
  server.post('/game', {
    schema: {
      body: zodToJsonSchema(GenerateGameRequestSchema, 'generateGameRequest'),
    },
    // The handler reports body errors in its own shape
    attachValidation: true,
    handler: createGenerateGameHandler(services),
  });

  server.post('/rules', {
    schema: {
      body: zodToJsonSchema(GenerateRulesRequestSchema, 'generateRulesRequest'),
      response: {
        200: zodToJsonSchema(GenerateRulesResponseSchema, 'generateRulesResponse'),
      },
    },
    attachValidation: true,
    handler: createGenerateRulesHandler(services),
  });
}

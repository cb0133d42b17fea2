import { FastifyRequest, FastifyReply } from 'fastify';

export const API_KEY_HEADER = 'x-game-synth-api-key';

/**
 * Build a hook that rejects requests whose API key header does not match
 */
export function createAuthenticate(expectedApiKey: string) {
  return async function authenticate(request: FastifyRequest, reply: FastifyReply) {
    const apiKey = request.headers[API_KEY_HEADER];

    if (!expectedApiKey || apiKey !== expectedApiKey) {
      return reply.code(401).send({ error: 'Unauthorized' });
    }
  };
}

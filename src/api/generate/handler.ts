import { FastifyReply, FastifyRequest } from 'fastify';
import { buildCodePrompt } from '../../ai/codegen/prompts.js';
import { generateRules } from '../../ai/codegen/rules-generator.js';
import { CompletionRouter } from '../../ai/codegen/generation-graph.js';
import { GenerationOrchestrator } from '../../ai/codegen/orchestrator.js';
import { GenerationAbortedError, GenerationResult } from '../../ai/codegen/types.js';
import { isProviderError } from '../../ai/providers/types.js';
import { logApplicationEvent } from '../../util/safe-logging.js';
import {
  AttemptSummary,
  GenerateGameRequestSchema,
  GenerateRulesRequestSchema,
  GenerateRulesResponse,
} from './schemas.js';

export interface GenerateRouteServices {
  orchestrator: Pick<GenerationOrchestrator, 'run'>;
  router: CompletionRouter;
}

/**
 * Abort the work once the client goes away before the reply is written
 */
function abortOnDisconnect(reply: FastifyReply): AbortController {
  const controller = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableEnded) {
      controller.abort();
    }
  });
  return controller;
}

function summarizeResult(result: GenerationResult) {
  const attempts: AttemptSummary[] = result.attempts.map((attempt) => ({
    attemptNumber: attempt.attemptNumber,
    providerUsed: attempt.providerUsed,
    timestamp: attempt.timestamp,
  }));

  if (result.status === 'success') {
    return {
      status: result.status,
      sessionId: result.sessionId,
      artifact: result.artifact,
      providerUsed: result.providerUsed,
      attemptNumber: result.attemptNumber,
      attempts,
      outcomes: result.outcomes,
    };
  }
  return {
    status: result.status,
    sessionId: result.sessionId,
    lastOutcome: result.lastOutcome,
    attempts,
    outcomes: result.outcomes,
  };
}

export function createGenerateGameHandler(services: GenerateRouteServices) {
  return async function handleGenerateGame(request: FastifyRequest, reply: FastifyReply) {
    const result = GenerateGameRequestSchema.safeParse(request.body);

    if (!result.success) {
      return reply.code(400).send({ error: 'Invalid request', details: result.error.issues });
    }

    const { rulesPrompt, gameName, metadata } = result.data;
    const prompt = rulesPrompt ?? (await buildCodePrompt(metadata ?? {}, gameName));
    const controller = abortOnDisconnect(reply);

    try {
      const generation = await services.orchestrator.run(prompt, { role: 'code', signal: controller.signal });
      logApplicationEvent('web-api', 'game-generated', {
        status: generation.status,
        attempts: generation.attempts.length,
      });
      return reply.code(200).send(summarizeResult(generation));
    } catch (error) {
      if (error instanceof GenerationAbortedError) {
        logApplicationEvent('web-api', 'game-generation-aborted');
        return reply.code(499).send({ error: 'Client closed request' });
      }
      throw error;
    }
  };
}

export function createGenerateRulesHandler(services: GenerateRouteServices) {
  return async function handleGenerateRules(request: FastifyRequest, reply: FastifyReply) {
    const result = GenerateRulesRequestSchema.safeParse(request.body);

    if (!result.success) {
      return reply.code(400).send({ error: 'Invalid request', details: result.error.issues });
    }

    const { gameName } = result.data;
    const controller = abortOnDisconnect(reply);

    try {
      const generated = await generateRules(services.router, gameName, { signal: controller.signal });
      const response: GenerateRulesResponse = {
        gameName,
        rules: generated.rules,
        providerUsed: generated.providerUsed,
      };
      return reply.code(200).send(response);
    } catch (error) {
      if (isProviderError(error)) {
        logApplicationEvent('web-api', 'rules-generation-failed', { reason: error.reason });
        return reply.code(502).send({ error: 'Rules generation failed', message: error.message });
      }
      throw error;
    }
  };
}

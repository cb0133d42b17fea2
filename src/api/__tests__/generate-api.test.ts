import { afterAll, beforeAll, describe, expect, test } from '@jest/globals';
import { FastifyInstance } from 'fastify';
import { buildServer } from '../../server.js';
import { GenerateRouteServices } from '../generate/handler.js';
import { GenerationResult, GenerationRunOptions } from '../../ai/codegen/types.js';
import { ProviderError, ProviderRole } from '../../ai/providers/types.js';

const API_KEY = 'test-secret';
const headers = { 'x-game-synth-api-key': API_KEY };

const runs: Array<{ rulesPrompt: string; options: GenerationRunOptions }> = [];
const routed: Array<{ prompt: string; role: ProviderRole }> = [];
let rulesAnswer: string | ProviderError = 'Roll two dice. Highest total wins.';

const services: GenerateRouteServices = {
  orchestrator: {
    async run(rulesPrompt: string, options: GenerationRunOptions = {}): Promise<GenerationResult> {
      runs.push({ rulesPrompt, options });
      if (rulesPrompt.includes('impossible')) {
        return {
          status: 'exhausted',
          sessionId: 'session-2',
          lastOutcome: { kind: 'syntax_error', message: 'Unexpected token', line: 1, column: 7 },
          attempts: [
            {
              attemptNumber: 1,
              providerUsed: 'FALLBACK',
              sourceText: 'const = 1;',
              prompt: rulesPrompt,
              timestamp: '2026-01-01T00:00:00.000Z',
            },
          ],
          outcomes: [{ kind: 'syntax_error', message: 'Unexpected token', line: 1, column: 7 }],
        };
      }
      return {
        status: 'success',
        sessionId: 'session-1',
        artifact: 'console.log("roll");',
        providerUsed: 'PRIMARY',
        attemptNumber: 1,
        attempts: [
          {
            attemptNumber: 1,
            providerUsed: 'PRIMARY',
            sourceText: 'console.log("roll");',
            prompt: rulesPrompt,
            timestamp: '2026-01-01T00:00:00.000Z',
          },
        ],
        outcomes: [{ kind: 'success' }],
      };
    },
  },
  router: {
    async generate(prompt: string, role: ProviderRole) {
      routed.push({ prompt, role });
      if (rulesAnswer instanceof ProviderError) throw rulesAnswer;
      return { text: rulesAnswer, providerUsed: 'FALLBACK' };
    },
  },
};

describe('Generate API', () => {
  let server: FastifyInstance;

  beforeAll(async () => {
    server = await buildServer({ apiKey: API_KEY, services, logger: false });
  });

  afterAll(async () => {
    await server.close();
  });

  test('should answer health checks without a key', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok' });
  });

  test('should reject requests without the API key', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/api/generate/game',
      payload: { rulesPrompt: 'Tic tac toe' },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ error: 'Unauthorized' });
    expect(runs).toHaveLength(0);
  });

  test('should reject a wrong API key', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/api/generate/rules',
      headers: { 'x-game-synth-api-key': 'wrong' },
      payload: { gameName: 'Dice' },
    });

    expect(response.statusCode).toBe(401);
  });

  describe('POST /api/generate/game', () => {
    test('should run a session for a rules prompt', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/generate/game',
        headers,
        payload: { rulesPrompt: 'Dice duel rules' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: 'success',
        sessionId: 'session-1',
        artifact: 'console.log("roll");',
        providerUsed: 'PRIMARY',
        attemptNumber: 1,
        attempts: [{ attemptNumber: 1, providerUsed: 'PRIMARY', timestamp: '2026-01-01T00:00:00.000Z' }],
        outcomes: [{ kind: 'success' }],
      });
      expect(runs[runs.length - 1].rulesPrompt).toBe('Dice duel rules');
      expect(runs[runs.length - 1].options.role).toBe('code');
    });

    test('should build the prompt from metadata', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/generate/game',
        headers,
        payload: { gameName: 'Dice Duel', metadata: { Overview: 'Two players roll dice.' } },
      });

      expect(response.statusCode).toBe(200);
      const prompt = runs[runs.length - 1].rulesPrompt;
      expect(prompt).toContain('Game Name: Dice Duel\nOverview: Two players roll dice.');
      expect(prompt).toContain('Game Objective: Not available');
    });

    test('should return the outcome history when the budget runs out', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/generate/game',
        headers,
        payload: { rulesPrompt: 'An impossible game' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: 'exhausted',
        sessionId: 'session-2',
        lastOutcome: { kind: 'syntax_error', message: 'Unexpected token', line: 1, column: 7 },
        attempts: [{ attemptNumber: 1, providerUsed: 'FALLBACK', timestamp: '2026-01-01T00:00:00.000Z' }],
        outcomes: [{ kind: 'syntax_error', message: 'Unexpected token', line: 1, column: 7 }],
      });
    });

    test('should reject a body without rulesPrompt or metadata', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/generate/game',
        headers,
        payload: { gameName: 'Dice Duel' },
      });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.error).toBe('Invalid request');
      expect(body.details[0].message).toBe('Either rulesPrompt or metadata is required');
    });
  });

  describe('POST /api/generate/rules', () => {
    test('should return generated rules', async () => {
      rulesAnswer = '  Roll two dice. Highest total wins.\n';
      const response = await server.inject({
        method: 'POST',
        url: '/api/generate/rules',
        headers,
        payload: { gameName: 'Dice Duel' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        gameName: 'Dice Duel',
        rules: 'Roll two dice. Highest total wins.',
        providerUsed: 'FALLBACK',
      });
      expect(routed[routed.length - 1].role).toBe('rules');
      expect(routed[routed.length - 1].prompt).toContain('design a new game called "Dice Duel"');
    });

    test('should answer 502 when every provider fails', async () => {
      rulesAnswer = new ProviderError('All providers failed: down; down', { reason: 'network' });
      const response = await server.inject({
        method: 'POST',
        url: '/api/generate/rules',
        headers,
        payload: { gameName: 'Dice Duel' },
      });

      expect(response.statusCode).toBe(502);
      expect(response.json()).toEqual({
        error: 'Rules generation failed',
        message: 'All providers failed: down; down',
      });
    });

    test('should reject a missing game name', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/generate/rules',
        headers,
        payload: {},
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('Invalid request');
    });
  });
});

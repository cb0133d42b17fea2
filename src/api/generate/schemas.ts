import { z } from 'zod';

export const GenerateGameRequestSchema = z
  .object({
    rulesPrompt: z.string().trim().min(1).max(20000).optional(),
    gameName: z.string().trim().min(1).max(200).optional(),
    metadata: z.record(z.string(), z.string().max(10000)).optional(),
  })
  .refine((body) => body.rulesPrompt !== undefined || body.metadata !== undefined, {
    message: 'Either rulesPrompt or metadata is required',
  });

export const GenerateRulesRequestSchema = z.object({
  gameName: z.string().trim().min(1).max(200),
});

const AttemptSummarySchema = z.object({
  attemptNumber: z.number(),
  providerUsed: z.enum(['PRIMARY', 'FALLBACK']),
  timestamp: z.string(),
});

export const GenerateRulesResponseSchema = z.object({
  gameName: z.string(),
  rules: z.string(),
  providerUsed: z.enum(['PRIMARY', 'FALLBACK']),
});

export type GenerateGameRequest = z.infer<typeof GenerateGameRequestSchema>;
export type GenerateRulesRequest = z.infer<typeof GenerateRulesRequestSchema>;
export type GenerateRulesResponse = z.infer<typeof GenerateRulesResponseSchema>;
export type AttemptSummary = z.infer<typeof AttemptSummarySchema>;

import { z } from 'zod';

// ── Request schemas ──────────────────────────────────────────────────────────

export const generationParametersSchema = z
  .object({
    temperature: z.number(),
    max_tokens: z.number().int(),
    top_p: z.number(),
    presence_penalty: z.number(),
    frequency_penalty: z.number(),
  })
  .partial();

export const generateBodySchema = z.object({
  prompt: z.string().min(1, 'prompt is required'),
  parameters: generationParametersSchema.optional(),
});

export type GenerateBody = z.infer<typeof generateBodySchema>;

// ── Response schemas ─────────────────────────────────────────────────────────

export interface GenerateReply {
  text: string;
}

export interface StreamLine {
  text: string;
  is_complete: boolean;
}

export interface StreamErrorLine {
  error: string;
  code: number;
}

export interface ErrorReply {
  error: string;
}

export interface HealthReply {
  status: 'ok' | 'degraded';
  backend: 'reachable' | 'unreachable';
}

import { z } from 'zod';
import type { GenerationChunk } from '../types/generation.types.js';

const generateLineSchema = z
  .object({
    response: z.string().optional(),
    done: z.boolean().optional(),
    error: z.string().optional(),
  })
  .passthrough();

export type DecodedLine =
  | { type: 'chunk'; chunk: GenerationChunk }
  | { type: 'error'; message: string }
  | { type: 'malformed'; reason: string };

/** Decodes one NDJSON line of an Ollama /api/generate body. */
export function decodeGenerateLine(line: string): DecodedLine {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    return { type: 'malformed', reason: err instanceof Error ? err.message : String(err) };
  }
  return decodeLinePayload(raw);
}

function decodeLinePayload(raw: unknown): DecodedLine {
  const parsed = generateLineSchema.safeParse(raw);
  if (!parsed.success) {
    return { type: 'malformed', reason: parsed.error.issues[0]?.message ?? 'unexpected shape' };
  }

  const { response, done, error } = parsed.data;
  if (error !== undefined) {
    return { type: 'error', message: error };
  }
  if (response !== undefined) {
    return { type: 'chunk', chunk: { text: response, isComplete: done === true } };
  }
  if (done === true) {
    return { type: 'chunk', chunk: { text: '', isComplete: true } };
  }
  return { type: 'malformed', reason: 'line carries neither response nor done' };
}

export type DecodedBody =
  | { type: 'result'; text: string }
  | { type: 'error'; message: string }
  | { type: 'malformed'; reason: string };

/** Decodes a parsed non-streaming /api/generate body. A missing `response` is empty text. */
export function decodeGenerateBody(raw: unknown): DecodedBody {
  const parsed = generateLineSchema.safeParse(raw);
  if (!parsed.success) {
    return { type: 'malformed', reason: parsed.error.issues[0]?.message ?? 'unexpected shape' };
  }
  if (parsed.data.error !== undefined) {
    return { type: 'error', message: parsed.data.error };
  }
  return { type: 'result', text: parsed.data.response ?? '' };
}

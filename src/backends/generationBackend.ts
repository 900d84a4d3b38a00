import type {
  GenerationChunk,
  GenerationRequest,
  GenerationResult,
} from '../types/generation.types.js';

export interface GenerationBackend {
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResult>;
  generateStream(request: GenerationRequest, signal?: AbortSignal): AsyncIterable<GenerationChunk>;
  isAvailable(): Promise<boolean>;
  close(): void;
}

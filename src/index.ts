// Public API: explicit named exports only (no re-export *)

export type { GenerationBackend } from './backends/generationBackend.js';
export type { CallContext, CallState } from './service/generationService.js';
export type { Logger } from './logging/logger.js';
export type {
  GenerationChunk,
  GenerationParameters,
  GenerationRequest,
  GenerationResult,
} from './types/generation.types.js';
export type {
  GenerateRequestMessage,
  GenerateResponseMessage,
  GenerateStreamResponseMessage,
} from './types/rpc.types.js';
export type { ServiceConfig } from './types/config.types.js';
export type { BackendErrorKind } from './errors/backend.js';

export { OllamaClient } from './backends/ollamaClient.js';
export { GenerationService } from './service/generationService.js';
export { createRpcServer, startRpcServer, stopRpcServer } from './rpc/server.js';
export { GenerationClient } from './rpc/client.js';
export { createApiServer } from './api/server.js';
export { createLogger } from './logging/logger.js';
export { loadConfig } from './config/loader.js';
export { validateConfig, ConfigValidationError } from './config/validator.js';
export { ServiceError } from './errors/base.js';
export { BackendError } from './errors/backend.js';
export { CallAbortedError, CallCancelledError } from './errors/call.js';

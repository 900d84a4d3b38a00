import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { fileURLToPath } from 'node:url';

export const PROTO_PATH = fileURLToPath(new URL('../../proto/generation.proto', import.meta.url));
export const SERVICE_NAME = 'textgen.v1.GenerationService';

const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: Number,
  enums: String,
  defaults: false,
};

let cached: grpc.ServiceDefinition | undefined;

function isServiceDefinition(
  def: protoLoader.AnyDefinition | undefined,
): def is protoLoader.ServiceDefinition {
  return def !== undefined && !('format' in def);
}

/** Loads the GenerationService definition from proto/generation.proto (once per process). */
export function loadGenerationService(): grpc.ServiceDefinition {
  if (cached) return cached;
  const packageDefinition = protoLoader.loadSync(PROTO_PATH, LOADER_OPTIONS);
  const service = packageDefinition[SERVICE_NAME];
  if (!isServiceDefinition(service)) {
    throw new Error(`${SERVICE_NAME} not found in ${PROTO_PATH}`);
  }
  cached = service;
  return service;
}

/** Method definitions are typed by the caller from the proto contract. */
export function getMethod<RequestType, ResponseType>(
  service: grpc.ServiceDefinition,
  name: 'Generate' | 'GenerateStream',
): grpc.MethodDefinition<RequestType, ResponseType> {
  const method = service[name];
  if (!method) {
    throw new Error(`${SERVICE_NAME}/${name} is not defined`);
  }
  return method;
}

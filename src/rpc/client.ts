import * as grpc from '@grpc/grpc-js';
import type {
  GenerateRequestMessage,
  GenerateResponseMessage,
  GenerateStreamResponseMessage,
} from '../types/rpc.types.js';
import { getMethod, loadGenerationService } from './proto.js';

export interface GenerationClientOptions {
  address: string;
  credentials?: grpc.ChannelCredentials;
}

/** Thin typed client for GenerationService, used by the `generate` command. */
export class GenerationClient {
  private readonly client: grpc.Client;
  private readonly unary: grpc.MethodDefinition<GenerateRequestMessage, GenerateResponseMessage>;
  private readonly streaming: grpc.MethodDefinition<GenerateRequestMessage, GenerateStreamResponseMessage>;

  constructor(options: GenerationClientOptions) {
    const service = loadGenerationService();
    this.unary = getMethod(service, 'Generate');
    this.streaming = getMethod(service, 'GenerateStream');
    this.client = new grpc.Client(
      options.address,
      options.credentials ?? grpc.credentials.createInsecure(),
    );
  }

  generate(request: GenerateRequestMessage): Promise<GenerateResponseMessage> {
    return new Promise((resolve, reject) => {
      this.client.makeUnaryRequest(
        this.unary.path,
        this.unary.requestSerialize,
        this.unary.responseDeserialize,
        request,
        (err, response) => {
          if (err) {
            reject(err);
          } else if (response === undefined) {
            reject(new Error('Generate returned no response'));
          } else {
            resolve(response);
          }
        },
      );
    });
  }

  async *generateStream(
    request: GenerateRequestMessage,
  ): AsyncGenerator<GenerateStreamResponseMessage, void, undefined> {
    const call = this.client.makeServerStreamRequest(
      this.streaming.path,
      this.streaming.requestSerialize,
      this.streaming.responseDeserialize,
      request,
    );
    try {
      for await (const message of call) {
        const decoded: GenerateStreamResponseMessage = message;
        yield decoded;
      }
    } finally {
      call.cancel();
    }
  }

  close(): void {
    this.client.close();
  }
}

export function isServiceError(err: unknown): err is grpc.ServiceError {
  return err instanceof Error && 'code' in err && 'details' in err;
}

// Wire shapes of proto/generation.proto as decoded by @grpc/proto-loader
// with keepCase and without defaults: unset optional fields are absent.

export interface GenerationParametersMessage {
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
  presence_penalty?: number;
  frequency_penalty?: number;
}

export interface GenerateRequestMessage {
  prompt?: string;
  parameters?: GenerationParametersMessage | null;
}

export interface GenerateResponseMessage {
  text: string;
}

export interface GenerateStreamResponseMessage {
  text: string;
  is_complete: boolean;
}

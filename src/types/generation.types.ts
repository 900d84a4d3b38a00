export interface GenerationParameters {
  temperature: number;
  maxTokens: number;
  topP: number;
  presencePenalty: number;
  frequencyPenalty: number;
}

export interface GenerationRequest {
  readonly prompt: string;
  readonly parameters: Readonly<GenerationParameters>;
}

export interface GenerationChunk {
  text: string;
  isComplete: boolean;
}

export interface GenerationResult {
  text: string;
}

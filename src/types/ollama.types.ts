export interface OllamaOptions {
  temperature: number;
  num_predict: number;
  top_p: number;
  presence_penalty: number;
  frequency_penalty: number;
}

export interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  stream: boolean;
  options: OllamaOptions;
}

export interface ProbeResult {
  reachable: boolean;
  modelAvailable: boolean;
  models: string[];
}

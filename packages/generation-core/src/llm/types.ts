export interface LLMRequest {
  model: string;
  prompt: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LLMResponse {
  text: string;
}

export interface LLMClient {
  complete(req: LLMRequest): Promise<LLMResponse>;
}

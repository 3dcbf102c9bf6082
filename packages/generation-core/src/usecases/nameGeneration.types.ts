export interface NameGenerationRequest {
  prompt: string;
}

export interface NameGenerationResult {
  text: string;
  model?: string;
}

/**
 * Produces names for a free-form prompt. Implementations reject with
 * `GenerationError` when no text could be produced.
 */
export interface NameGenerator {
  generate(request: NameGenerationRequest, signal?: AbortSignal): Promise<NameGenerationResult>;
}

export interface LlmNameGeneratorOptions {
  model?: string;
  systemPrompt?: string;
  temperature?: number;
}

export interface PlaceholderNameGeneratorOptions {
  delayMs?: number;
  text?: string;
}

export type { LLMClient, LLMRequest, LLMResponse } from "./llm/types.js";
export { OpenAICompatibleClient } from "./llm/openaiCompatibleClient.js";
export type { OpenAICompatibleClientOptions } from "./llm/openaiCompatibleClient.js";
export { GenerationError } from "./errors.js";
export type {
  LlmNameGeneratorOptions,
  NameGenerationRequest,
  NameGenerationResult,
  NameGenerator,
  PlaceholderNameGeneratorOptions,
} from "./usecases/nameGeneration.types.js";
export { LlmNameGenerator } from "./usecases/nameGeneration.js";
export {
  DEFAULT_PLACEHOLDER_DELAY_MS,
  DEFAULT_PLACEHOLDER_TEXT,
  PlaceholderNameGenerator,
} from "./usecases/placeholderNameGenerator.js";
export { NAMING_SYSTEM_PROMPT, buildNamingPrompt } from "./usecases/namingPrompts.js";

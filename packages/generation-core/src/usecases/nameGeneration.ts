import { GenerationError } from '../errors.js';
import type { LLMClient } from '../llm/types.js';
import { NAMING_SYSTEM_PROMPT, buildNamingPrompt } from './namingPrompts.js';
import type {
  LlmNameGeneratorOptions,
  NameGenerationRequest,
  NameGenerationResult,
  NameGenerator,
} from './nameGeneration.types.js';

export class LlmNameGenerator implements NameGenerator {
  constructor(
    private readonly llm: LLMClient,
    private readonly options: LlmNameGeneratorOptions = {},
  ) {}

  async generate(request: NameGenerationRequest, signal?: AbortSignal): Promise<NameGenerationResult> {
    const condition = request.prompt.trim();
    if (!condition) {
      throw new GenerationError('名前の条件を入力してください');
    }

    const model = (this.options.model ?? '').trim();

    let text: string;
    try {
      const response = await this.llm.complete({
        model,
        prompt: buildNamingPrompt(condition),
        systemPrompt: this.options.systemPrompt ?? NAMING_SYSTEM_PROMPT,
        temperature: this.options.temperature,
        signal,
      });
      text = response.text.trim();
    } catch (error) {
      if (error instanceof GenerationError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : '名前の生成に失敗しました';
      throw new GenerationError(message, { cause: error });
    }

    if (!text) {
      throw new GenerationError('生成結果が空でした');
    }

    return {
      text,
      model: model || undefined,
    };
  }
}

import type { NameGenerator } from '@contents-generator/generation-core';

import {
  ScreenController,
  describeFailure,
  type ScreenControllerOptions,
} from '../../state/screenController.js';
import {
  applyGeneratedText,
  applyPromptInput,
  beginGeneration,
  clearGenerationError,
  createInitialNameGeneratorState,
  failGeneration,
  type NameGeneratorState,
} from './nameGeneratorState.js';

export class NameGeneratorController extends ScreenController<NameGeneratorState> {
  constructor(
    private readonly generator: NameGenerator,
    options: ScreenControllerOptions = {},
  ) {
    super(createInitialNameGeneratorState(), options);
  }

  updatePrompt(prompt: string): void {
    this.updateState((state) => applyPromptInput(state, prompt));
  }

  retry(): void {
    this.updateState(clearGenerationError);
  }

  generateName(): Promise<void> {
    return this.launch(async (signal) => {
      this.updateState(beginGeneration);
      const { prompt } = this.state;

      let text: string;
      try {
        const result = await this.generator.generate({ prompt }, signal);
        text = result.text;
      } catch (error) {
        if (signal.aborted) {
          return;
        }
        this.logger.warn('[name-generator] generation failed', error);
        const message = describeFailure(error, '名前の生成に失敗しました');
        this.updateState((state) => failGeneration(state, message));
        return;
      }

      if (signal.aborted) {
        return;
      }
      this.updateState((state) => applyGeneratedText(state, text));
    });
  }
}

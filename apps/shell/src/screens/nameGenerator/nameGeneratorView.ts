import type { NameGeneratorState } from './nameGeneratorState.js';

export type NameGeneratorView =
  | { kind: 'error'; message: string }
  | {
      kind: 'form';
      prompt: string;
      generatedText: string;
      isGenerating: boolean;
      canGenerate: boolean;
      canClear: boolean;
    };

export const PROMPT_PLACEHOLDER = 'どんな条件で名前を作成しますか？';

export function resolveNameGeneratorView(state: NameGeneratorState): NameGeneratorView {
  if (state.errorMessage !== null) {
    return { kind: 'error', message: state.errorMessage };
  }
  const hasPrompt = state.prompt.length > 0;
  return {
    kind: 'form',
    prompt: state.prompt,
    generatedText: state.generatedText,
    isGenerating: state.isGenerating,
    canGenerate: hasPrompt && !state.isGenerating,
    canClear: hasPrompt,
  };
}

export type NameGeneratorState = {
  prompt: string;
  generatedText: string;
  isGenerating: boolean;
  errorMessage: string | null;
};

export function createInitialNameGeneratorState(): NameGeneratorState {
  return {
    prompt: '',
    generatedText: '',
    isGenerating: false,
    errorMessage: null,
  };
}

export function applyPromptInput(state: NameGeneratorState, prompt: string): NameGeneratorState {
  if (state.prompt === prompt) {
    return state;
  }
  return {
    ...state,
    prompt,
  };
}

export function clearGenerationError(state: NameGeneratorState): NameGeneratorState {
  if (state.errorMessage === null) {
    return state;
  }
  return {
    ...state,
    errorMessage: null,
  };
}

export function beginGeneration(state: NameGeneratorState): NameGeneratorState {
  return {
    ...state,
    isGenerating: true,
  };
}

export function applyGeneratedText(state: NameGeneratorState, generatedText: string): NameGeneratorState {
  return {
    ...state,
    generatedText,
    isGenerating: false,
  };
}

export function failGeneration(state: NameGeneratorState, message: string): NameGeneratorState {
  return {
    ...state,
    isGenerating: false,
    errorMessage: message,
  };
}

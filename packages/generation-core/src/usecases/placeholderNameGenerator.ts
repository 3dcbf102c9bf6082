import { GenerationError } from '../errors.js';
import type {
  NameGenerationRequest,
  NameGenerationResult,
  NameGenerator,
  PlaceholderNameGeneratorOptions,
} from './nameGeneration.types.js';

export const DEFAULT_PLACEHOLDER_TEXT =
  'これはテスト用の文字列です。実際は生成した名前をここに表示します。';

export const DEFAULT_PLACEHOLDER_DELAY_MS = 5_000;

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new GenerationError('名前の生成がキャンセルされました'));
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = () => {
      clearTimeout(timer);
      reject(new GenerationError('名前の生成がキャンセルされました'));
    };

    timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Stand-in generator: waits a fixed time and answers with a constant text.
 * Used until a generation endpoint is configured.
 */
export class PlaceholderNameGenerator implements NameGenerator {
  private readonly delayMs: number;

  private readonly text: string;

  constructor(options: PlaceholderNameGeneratorOptions = {}) {
    this.delayMs = Math.max(0, options.delayMs ?? DEFAULT_PLACEHOLDER_DELAY_MS);
    this.text = options.text ?? DEFAULT_PLACEHOLDER_TEXT;
  }

  async generate(_request: NameGenerationRequest, signal?: AbortSignal): Promise<NameGenerationResult> {
    await wait(this.delayMs, signal);
    return { text: this.text };
  }
}

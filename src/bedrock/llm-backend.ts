export const LLM_BACKEND = Symbol('LLM_BACKEND');

/**
 * The language model backend the pipeline depends on: one embedding call and one
 * completion call. Both must stop work when `signal` aborts.
 */
export interface LanguageModelBackend {
  readonly embeddingModel: string;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  complete(prompt: string, signal?: AbortSignal): Promise<string>;
}

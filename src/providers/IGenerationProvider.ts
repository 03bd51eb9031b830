/**
 * Text generation provider interface.
 * Implementations own their timeout and retry policy; a rejection means
 * every attempt failed.
 */

export interface GenerationOptions {
  /** Sampling temperature. Default: 0.7. */
  temperature?: number;
  /** Upper bound on completion length. Default: 2000. */
  maxTokens?: number;
  systemMessage?: string;
}

export interface IGenerationProvider {
  generate(prompt: string, options?: GenerationOptions): Promise<string>;
}

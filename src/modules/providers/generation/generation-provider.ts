export type GenerationRequest = {
  prompt: string;
  temperature: number;
  /** Ask the model for a single JSON object. */
  json: boolean;
};

export interface GenerationProvider {
  readonly name: string;
  configured(): boolean;
  /** Returns the raw completion text. Throws ProviderError (or any error, treated as retryable) on failure. */
  generate(req: GenerationRequest): Promise<string>;
}

export const GENERATION_PROVIDER = Symbol('GENERATION_PROVIDER');

export interface GenerateOptions {
  /** Sampling temperature; higher spreads topics further apart. */
  temperature: number;
  /** Ask the model for a JSON document instead of free text. */
  json?: boolean;
}

/**
 * Narrow capability over a hosted language model. Implementations return the
 * full response text and throw on transport or safety-block errors.
 */
export interface TextGenerator {
  readonly name: string;
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

/**
 * Inference client settings
 */
export interface InferenceClientConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  generation: GenerationParams;
}

/**
 * Sampling settings sent with every completion request
 */
export interface GenerationParams {
  temperature: number;
  /** Penalty applied to recently generated tokens */
  repetitionPenalty: number;
  /** How many trailing tokens the repetition penalty looks at */
  lastNTokens: number;
  maxNewTokens: number;
  topK?: number;
  topP?: number;
  seed?: number;
  stop?: string[];
}

/**
 * Anything that turns a prompt into generated text
 */
export interface InferenceEngine {
  complete(prompt: string): Promise<string>;
}

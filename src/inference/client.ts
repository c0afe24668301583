import OpenAI from 'openai';
import type { GenerationParams, InferenceClientConfig, InferenceEngine } from './types.js';
import { InferenceError } from '../errors.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';

/**
 * Sampling fields outside the OpenAI schema that llama.cpp-style servers accept
 */
interface LocalSamplingParams {
  top_k?: number;
  repeat_penalty: number;
  repeat_last_n: number;
}

type CompletionRequest = OpenAI.CompletionCreateParamsNonStreaming & LocalSamplingParams;

// Local models on CPU can take minutes for a long answer
const REQUEST_TIMEOUT_MS = 10 * 60 * 1000;

/**
 * Client for a local model served behind an OpenAI-compatible completions endpoint
 */
export class InferenceClient implements InferenceEngine {
  private client: OpenAI;
  private model: string;
  private generation: GenerationParams;
  private retryOptions: RetryOptions | undefined;

  constructor(config: InferenceClientConfig, retryOptions?: RetryOptions) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: REQUEST_TIMEOUT_MS,
      // retries go through withRetry
      maxRetries: 0,
    });
    this.model = config.model;
    this.generation = config.generation;
    this.retryOptions = retryOptions;
  }

  /**
   * Run one completion and return the generated text
   */
  async complete(prompt: string): Promise<string> {
    const request = this.buildRequest(prompt);

    let response: OpenAI.Completion;
    try {
      response = await withRetry(() => this.client.completions.create(request), this.retryOptions);
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'Unknown error';
      throw new InferenceError(this.model, `Inference request failed: ${reason}`, { cause: error });
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new InferenceError(this.model, 'Inference response contained no choices');
    }
    return choice.text;
  }

  private buildRequest(prompt: string): CompletionRequest {
    const g = this.generation;
    const request: CompletionRequest = {
      model: this.model,
      prompt,
      stream: false,
      temperature: g.temperature,
      max_tokens: g.maxNewTokens,
      repeat_penalty: g.repetitionPenalty,
      repeat_last_n: g.lastNTokens,
    };

    if (g.topK !== undefined) request.top_k = g.topK;
    if (g.topP !== undefined) request.top_p = g.topP;
    if (g.seed !== undefined) request.seed = g.seed;
    if (g.stop && g.stop.length > 0) request.stop = g.stop;

    return request;
  }
}

// Types
export type {
  InferenceClientConfig,
  GenerationParams,
  InferenceEngine,
} from './types.js';

// Client
export { InferenceClient } from './client.js';

// Prompts
export { INSTRUCTION_PREAMBLE, buildInstructionPrompt } from './prompts.js';

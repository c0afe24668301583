import type { Logger } from '../logger.js';
import type { InferenceEngine } from '../inference/types.js';

/**
 * Message bridge settings
 */
export interface MessageBridgeOptions {
  engine: InferenceEngine;
  /** Where the latest generated text is written */
  outputPath: string;
  logger: Logger;
}

/**
 * Outcome of one processed message
 */
export interface BridgeResult {
  /** Cleaned text that was sent to the model */
  instruction: string;
  /** Generated text, as returned by the model */
  output: string;
  /** File holding `output` */
  outputPath: string;
}

import { writeFile } from 'node:fs/promises';
import type { Logger } from '../logger.js';
import type { InferenceEngine } from '../inference/types.js';
import { buildInstructionPrompt } from '../inference/prompts.js';
import { SerialQueue } from '../utils/serial-queue.js';
import { filterContent } from './filter.js';
import type { BridgeResult, MessageBridgeOptions } from './types.js';

/**
 * Turns one inbound message into one generated reply.
 * Inference runs one message at a time.
 */
export class MessageBridge {
  private engine: InferenceEngine;
  private outputPath: string;
  private logger: Logger;
  private queue = new SerialQueue();

  constructor(options: MessageBridgeOptions) {
    this.engine = options.engine;
    this.outputPath = options.outputPath;
    this.logger = options.logger;
  }

  /** Messages waiting for or undergoing inference */
  get backlog(): number {
    return this.queue.size;
  }

  /**
   * Clean the message, run inference and record the output
   */
  process(content: string, botNames: readonly string[]): Promise<BridgeResult> {
    const instruction = filterContent(content, botNames);
    return this.queue.run(async () => {
      const startedAt = Date.now();
      const output = await this.engine.complete(buildInstructionPrompt(instruction));
      this.logger.info(
        { instructionLength: instruction.length, outputLength: output.length, durationMs: Date.now() - startedAt },
        'Inference complete',
      );

      await writeFile(this.outputPath, output, 'utf-8');
      return { instruction, output, outputPath: this.outputPath };
    });
  }
}

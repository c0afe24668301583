import { basename } from 'node:path';
import type { ReplyPlan } from './types.js';

export const ACKNOWLEDGEMENT = 'You called?';

/**
 * Inline text when it fits, otherwise a notice with the output attached
 */
export function planReply(output: string, messageLimit: number, outputPath: string): ReplyPlan {
  if (output.trim().length === 0) return { kind: 'none' };
  // counted in code points, not UTF-16 units
  if ([...output].length <= messageLimit) return { kind: 'text', content: output };

  const fileName = basename(outputPath);
  return {
    kind: 'attachment',
    notice: `Response content exceeded Discord's message size limits; see ${fileName}`,
    fileName,
    data: Buffer.from(output, 'utf-8'),
  };
}

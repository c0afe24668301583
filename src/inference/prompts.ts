/**
 * Instruction-following template the local models are prompted with
 */
export const INSTRUCTION_PREAMBLE =
  'Below is an instruction that describes a task. Write a response that appropriately completes the request.';

export function buildInstructionPrompt(instruction: string): string {
  return `Prompt:\n${INSTRUCTION_PREAMBLE}\n\n### Instruction:\n${instruction}\n\n### Response:\n`;
}

/**
 * Interactive prompts
 */

import * as readline from 'readline';

/**
 * Asks a yes/no question; resolves true only when confirmed
 */
export type ConfirmPrompt = (message: string) => Promise<boolean>;

/**
 * Prompt for single-line input
 */
export function promptSingleLine(prompt: string): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    rl.question(prompt, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

/**
 * Destructive actions need the full word "yes"
 */
export const confirmWithYes: ConfirmPrompt = async (message) => {
  const answer = await promptSingleLine(`${message} Type 'yes' to continue: `);
  return answer.toLowerCase() === 'yes';
};

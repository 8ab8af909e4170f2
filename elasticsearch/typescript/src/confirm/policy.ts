/**
 * Confirmation policies for destructive operations.
 *
 * @module confirm/policy
 */

import * as readline from 'readline';

/**
 * Decides whether a destructive operation may proceed.
 */
export type ConfirmationPolicy = (prompt: string) => Promise<boolean>;

/**
 * Streams used by the console confirmation.
 */
export interface ConsoleConfirmationOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Only a literal "n" (either case) declines. Anything else, including an
 * empty answer, confirms.
 */
export function isDeclined(answer: string): boolean {
  return answer.toLowerCase() === 'n';
}

/**
 * Asks the operator on the terminal and waits for a line of input.
 * There is no timeout.
 */
export function createConsoleConfirmation(options: ConsoleConfirmationOptions = {}): ConfirmationPolicy {
  return async (prompt: string): Promise<boolean> => {
    const rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout,
    });

    const question = (text: string): Promise<string> => {
      return new Promise((resolve, reject) => {
        const onClose = (): void => {
          reject(new Error('Input closed before an answer was given'));
        };
        rl.once('close', onClose);
        rl.question(text, (answer) => {
          rl.off('close', onClose);
          resolve(answer);
        });
      });
    };

    try {
      const answer = await question(prompt);
      return !isDeclined(answer);
    } finally {
      rl.close();
    }
  };
}

/**
 * Policy with a fixed answer, for scripts and tests.
 */
export function fixedConfirmation(answer: boolean): ConfirmationPolicy {
  return async () => answer;
}

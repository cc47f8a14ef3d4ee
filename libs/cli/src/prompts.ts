/**
 * Line prompts for the non-interactive commands
 */

import * as readline from 'node:readline';

/** Returns the answer, or null when input ends or is interrupted. */
export interface Prompter {
  ask(question: string): Promise<string | null>;
}

export class ReadlinePrompter implements Prompter {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  ask(question: string): Promise<string | null> {
    return new Promise<string | null>((resolve) => {
      const rl = readline.createInterface({ input: this.input, output: this.output });
      let answered = false;

      rl.on('SIGINT', () => {
        this.output.write('\n');
        rl.close();
      });
      rl.once('close', () => {
        if (!answered) resolve(null);
      });
      rl.question(question, (answer) => {
        answered = true;
        rl.close();
        resolve(answer);
      });
    });
  }
}

/** Yes/no question. An empty answer takes `fallback`. */
export async function confirm(prompter: Prompter, question: string, fallback = false): Promise<boolean> {
  const answer = await prompter.ask(`${question} ${fallback ? '(Y/n)' : '(y/N)'} `);
  if (answer === null) return false;
  const normalized = answer.trim().toLowerCase();
  if (normalized === '') return fallback;
  return normalized === 'y' || normalized === 'yes';
}

import type { Prompter } from '../../lib/prompts.js';

/**
 * Prompter that answers from a script and records the questions asked
 */
export class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];
  closed = false;

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string> {
    this.asked.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`No scripted answer for: ${question}`);
    }
    return answer.trim();
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Interactive confirmations
 */

import * as clack from '@clack/prompts';

/**
 * y / N / q / yq, plus the extra answers some questions offer
 */
export type Answer = 'yes' | 'no' | 'quit' | 'yes-quit' | 'other-remote';

export const YES_NO_QUIT: readonly Answer[] = ['yes', 'no', 'quit', 'yes-quit'];
export const YES_NO: readonly Answer[] = ['yes', 'no'];
export const YES_NO_ONLY_QUIT: readonly Answer[] = ['yes', 'no', 'quit'];

const LABELS: Record<Answer, { label: string; hint: string }> = {
  yes: { label: 'y', hint: 'yes' },
  no: { label: 'N', hint: 'no, skip' },
  quit: { label: 'q', hint: 'quit' },
  'yes-quit': { label: 'yq', hint: 'yes, then quit' },
  'other-remote': { label: 'o', hint: 'pick another remote' },
};

export function formatChoices(choices: readonly Answer[]): string {
  return `(${choices.map((choice) => LABELS[choice].label).join(', ')})`;
}

export function isYes(answer: Answer): boolean {
  return answer === 'yes' || answer === 'yes-quit';
}

export interface Prompter {
  ask(message: string, choices: readonly Answer[]): Promise<Answer>;
  /** Returns null when the user backs out */
  pick(message: string, options: readonly string[]): Promise<string | null>;
}

export class ClackPrompter implements Prompter {
  async ask(message: string, choices: readonly Answer[]): Promise<Answer> {
    const answer = await clack.select<Answer>({
      message: `${message} ${formatChoices(choices)}`,
      options: choices.map((value) => ({ value, label: LABELS[value].label, hint: LABELS[value].hint })),
      initialValue: choices.includes('no') ? 'no' : choices[0],
    });
    if (clack.isCancel(answer)) {
      return 'quit';
    }
    return answer;
  }

  async pick(message: string, options: readonly string[]): Promise<string | null> {
    const answer = await clack.select<string>({
      message,
      options: options.map((value) => ({ value, label: value })),
    });
    if (clack.isCancel(answer)) {
      return null;
    }
    return answer;
  }
}

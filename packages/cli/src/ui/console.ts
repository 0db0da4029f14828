import inquirer from 'inquirer';
import type { Verdict } from '@rebisect/shared';
import type { VerdictContext, VerdictSource } from '@rebisect/core';

export interface ConsoleUIOptions {
  /** Answer yes to every confirmation */
  yes?: boolean;
  /** Never prompt; confirmations are declined */
  nonInteractive?: boolean;
}

export class ConsoleUI {
  constructor(private readonly options: ConsoleUIOptions = {}) {}

  get canPrompt(): boolean {
    return !this.options.nonInteractive && Boolean(process.stdin.isTTY);
  }

  async confirm(message: string, details?: string, defaultNo?: boolean): Promise<boolean> {
    if (this.options.yes) {
      return true;
    }
    if (!this.canPrompt) {
      return false;
    }
    if (details) {
      console.log('\n' + details + '\n');
    }
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message: message,
        default: !defaultNo,
      },
    ]);
    return confirmed;
  }

  async askVerdict(revision: string): Promise<Verdict> {
    const { verdict } = await inquirer.prompt<{ verdict: Verdict }>([
      {
        type: 'list',
        name: 'verdict',
        message: `Does ${revision} show the problem?`,
        choices: [
          { name: 'No, it is good', value: 'good' },
          { name: 'Yes, it is bad', value: 'bad' },
        ],
      },
    ]);
    return verdict;
  }
}

/**
 * Asks the person at the terminal for each verdict, after the build has finished.
 */
export class PromptVerdictSource implements VerdictSource {
  constructor(private readonly ui: ConsoleUI = new ConsoleUI()) {}

  async verdictFor({ revision, checkoutDir }: VerdictContext): Promise<Verdict> {
    console.log(`\nBuilt ${revision} in ${checkoutDir}`);
    return this.ui.askVerdict(revision);
  }
}

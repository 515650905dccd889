/**
 * Prompt Service
 *
 * Interactive confirmation for destructive CLI actions, with TTY detection.
 */

import inquirer from 'inquirer';

/**
 * Prompt Service Interface
 */
export interface IPromptService {
  isInteractive(): boolean;
  promptForConfirmation(message: string): Promise<boolean>;
}

/**
 * Prompt Service Implementation
 */
export class PromptService implements IPromptService {
  /**
   * Check if the terminal supports interactive input
   */
  isInteractive(): boolean {
    return process.stdin.isTTY === true;
  }

  /**
   * Prompt for confirmation
   */
  async promptForConfirmation(message: string): Promise<boolean> {
    if (!this.isInteractive()) {
      // In non-interactive mode, default to false for safety
      return false;
    }

    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message,
        default: false
      }
    ]);

    return confirmed;
  }
}

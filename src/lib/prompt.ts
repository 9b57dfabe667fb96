import inquirer from 'inquirer';

export interface ConfirmPrompt {
  confirm(message: string): Promise<boolean>;
}

/**
 * Asks on stderr so the question never mixes with piped stdout; anything but
 * an explicit yes counts as no
 */
export class InquirerConfirmPrompt implements ConfirmPrompt {
  private readonly prompt = inquirer.createPromptModule({ output: process.stderr });

  async confirm(message: string): Promise<boolean> {
    const { confirmed } = await this.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message,
        default: false
      }
    ]);
    return confirmed === true;
  }
}

/**
 * Used for --yes and SKIP_CONFIRM
 */
export class AssumeYesPrompt implements ConfirmPrompt {
  async confirm(): Promise<boolean> {
    return true;
  }
}

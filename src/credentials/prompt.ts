import { confirm, input, password } from '@inquirer/prompts';

/** Interactive input used by the credential resolver. */
export interface Prompter {
  username(message: string): Promise<string>;
  secret(message: string): Promise<string>;
  confirm(message: string): Promise<boolean>;
}

/** Terminal prompts via @inquirer/prompts. */
export class InquirerPrompter implements Prompter {
  async username(message: string): Promise<string> {
    return input({
      message,
      validate: (value) => value.trim() !== '' || 'A username is required',
    });
  }

  async secret(message: string): Promise<string> {
    return password({ message, mask: '*' });
  }

  async confirm(message: string): Promise<boolean> {
    return confirm({ message, default: false });
  }
}

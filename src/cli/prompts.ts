import inquirer from 'inquirer';
import type { HumanInterface } from '../agent/collaborators';

interface AnswerPrompt {
  answer: string;
}

/** Asks the operator in the terminal; options become a list, otherwise free text */
export class InquirerHumanInterface implements HumanInterface {
  async ask(prompt: string, options: readonly string[]): Promise<string> {
    if (options.length === 0) {
      const { answer } = await inquirer.prompt<AnswerPrompt>([
        {
          type: 'input',
          name: 'answer',
          message: prompt,
          validate: (input: string) => input.trim().length > 0 || 'An answer is required',
        },
      ]);
      return answer.trim();
    }

    const { answer } = await inquirer.prompt<AnswerPrompt>([
      {
        type: 'list',
        name: 'answer',
        message: prompt,
        choices: [...options],
        default: options[0],
      },
    ]);
    return answer;
  }
}

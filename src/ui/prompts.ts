import { confirm, select, input } from '@inquirer/prompts';

export async function confirmPrompt(message: string, defaultValue = true): Promise<boolean> {
  return confirm({ message, default: defaultValue });
}

export async function selectPrompt<T>(
  message: string,
  choices: { name: string; value: T }[],
  defaultValue?: T,
): Promise<T> {
  return select({ message, choices, default: defaultValue });
}

export async function inputPrompt(message: string, defaultValue?: string): Promise<string> {
  return input({ message, default: defaultValue });
}

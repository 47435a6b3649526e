/**
 * Interactive Values
 *
 * Resolves interactive arguments a parse left pending. Values are read with
 * @inquirer/prompts (dynamic import for ES Module) unless an asker is given.
 */

import { logger } from './logger.js';
import type { ParseResult, PendingInteractiveValue } from './model/parse-result.js';

type PasswordFunction = (config: { message: string; mask?: boolean | string }) => Promise<string>;

/** Reads the value of one pending argument */
export type AskFunction = (pending: PendingInteractiveValue) => Promise<string>;

export interface PromptOptions {
  /** Replaces the @inquirer/prompts password prompt */
  ask?: AskFunction;
}

let _password: PasswordFunction | undefined;

/**
 * Load @inquirer/prompts (ES Module) on first use
 */
export async function loadInquirer(): Promise<PasswordFunction> {
  if (!_password) {
    const inquirer = await import('@inquirer/prompts');
    _password = inquirer.password;
  }
  return _password;
}

/**
 * Check if error is from ESC/Ctrl+C
 * @inquirer/prompts can throw different error types:
 * - ExitPromptError: User pressed Ctrl+C
 * - AbortPromptError: Prompt was aborted
 * - CancelPromptError: User pressed ESC
 */
export function isExitError(err: unknown): boolean {
  return (
    err !== null &&
    typeof err === 'object' &&
    'name' in err &&
    (err.name === 'ExitPromptError' || err.name === 'AbortPromptError' || err.name === 'CancelPromptError')
  );
}

async function defaultAsk(): Promise<AskFunction> {
  const password = await loadInquirer();
  return (pending) => password({ message: pending.prompt.trim(), mask: '*' });
}

/**
 * Ask for every pending interactive value of `result` and its subcommand
 * results, in match order, and store the answers.
 *
 * Returns false if the user cancelled a prompt; values entered before the
 * cancelled one are kept.
 *
 * @throws {ParameterError} If an entered value cannot be converted
 */
export async function promptForInteractiveValues(result: ParseResult, options: PromptOptions = {}): Promise<boolean> {
  const pending = result.allPendingInteractive();
  if (pending.length === 0) {
    return true;
  }
  const ask = options.ask ?? (await defaultAsk());

  for (const item of pending) {
    let answer: string;
    try {
      answer = await ask(item);
    } catch (err) {
      if (isExitError(err)) {
        logger.info(`Prompt for ${item.argSpec.toString()} was cancelled`);
        return false;
      }
      throw err;
    }
    item.apply(answer);
  }
  return true;
}

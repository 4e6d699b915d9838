/**
 * Terminal input source backed by @inquirer/prompts.
 */

import { confirm, input, password, select } from '@inquirer/prompts';
import { extractErrorMessage } from '@/lib/errors';
import { Success, Failure, ERROR_CODES, type Result } from '@/types';
import type { InputSource } from './input-source';

export interface InteractiveInputOptions {
  /** Aborting the signal cancels the open prompt */
  signal?: AbortSignal;
  /** Called when the operator presses Ctrl+C inside a prompt */
  onInterrupt?: () => void;
}

function isPromptCancellation(error: unknown): boolean {
  return (
    error instanceof Error && (error.name === 'ExitPromptError' || error.name === 'AbortPromptError')
  );
}

export function createInteractiveInput(options: InteractiveInputOptions = {}): InputSource {
  const context = options.signal ? { signal: options.signal } : {};

  async function ask<T>(prompt: () => Promise<T>): Promise<Result<T>> {
    try {
      return Success(await prompt());
    } catch (error) {
      if (isPromptCancellation(error)) {
        options.onInterrupt?.();
        return Failure('Prompt cancelled', { message: 'Interrupted by operator' });
      }
      const message = `Prompt failed: ${extractErrorMessage(error)}`;
      return Failure(message, { message, code: ERROR_CODES.userInput });
    }
  }

  return {
    interactive: true,

    text(question) {
      const fallback = question.default;
      const validate = (value: string): string | boolean => {
        const trimmed = value.trim();
        if (trimmed === '') return fallback ? true : `${question.name} is required`;
        return question.validate?.(trimmed) ?? true;
      };

      if (question.secret) {
        // password prompts show no default; an empty answer keeps it
        return ask(async () => {
          const answer = (await password({ message: question.message, mask: '*', validate }, context)).trim();
          return answer === '' && fallback ? fallback : answer;
        });
      }
      return ask(async () =>
        (
          await input(
            {
              message: question.message,
              validate,
              ...(question.default !== undefined && { default: question.default }),
            },
            context,
          )
        ).trim(),
      );
    },

    select(question) {
      return ask(() =>
        select(
          {
            message: question.message,
            choices: question.choices.map((value) => ({ value, name: value })),
            ...(question.default !== undefined && { default: question.default }),
          },
          context,
        ),
      );
    },

    confirm(question) {
      return ask(() => confirm({ message: question.message, default: question.default }, context));
    },
  };
}

import * as p from "@clack/prompts";
import { UserCancelledError } from "./errors.js";

/**
 * Returns true if the CLI is running in an interactive terminal.
 * False when piped or in CI.
 */
export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY) && !process.env.CI;
}

/**
 * Unwraps a clack prompt result. Ctrl+C at a prompt cancels the whole run.
 */
export function handleCancel<T>(value: T | symbol): T {
  if (p.isCancel(value)) {
    p.cancel("Cancelled.");
    throw new UserCancelledError();
  }
  return value;
}

export interface Prompter {
  confirm(message: string, initialValue: boolean): Promise<boolean>;
}

export const clackPrompter: Prompter = {
  async confirm(message, initialValue) {
    return handleCancel(await p.confirm({ message, initialValue }));
  },
};

/** Answers every question with its default. Used when nobody is at the terminal. */
export const defaultsPrompter: Prompter = {
  async confirm(_message, initialValue) {
    return initialValue;
  },
};

export function createPrompter(interactive: boolean): Prompter {
  return interactive ? clackPrompter : defaultsPrompter;
}

/**
 * Wraps an async operation with a clack spinner.
 * Only shows spinner when interactive.
 */
export async function withSpinner<T>(
  message: string,
  fn: () => Promise<T>,
  successMessage?: string,
): Promise<T> {
  if (!isInteractive()) {
    return fn();
  }

  const s = p.spinner();
  s.start(message);
  try {
    const result = await fn();
    s.stop(successMessage ?? message);
    return result;
  } catch (err) {
    s.stop(`Failed: ${message}`);
    throw err;
  }
}

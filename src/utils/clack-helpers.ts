import * as clack from '@clack/prompts';

/**
 * Unwrap a clack prompt result. On cancellation (Ctrl+C, Esc) the cancel
 * message is shown and `undefined` comes back so the caller can bail out.
 */
export function unwrapPrompt<T>(result: T | symbol, message: string = 'Operation cancelled'): T | undefined {
  if (clack.isCancel(result)) {
    clack.cancel(message);
    return undefined;
  }
  return result;
}

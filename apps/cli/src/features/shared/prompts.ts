import * as p from '@clack/prompts';

/**
 * Check if the operation was cancelled by the user.
 */
export function isCancelled<T>(value: T | symbol): value is symbol {
  return p.isCancel(value);
}

/**
 * Handle cancellation by showing a message and exiting.
 */
export function handleCancellation(message = 'Operation cancelled'): never {
  p.cancel(message);
  process.exit(0);
}

/**
 * Ask a yes/no question. Cancelling (Ctrl+C) exits.
 */
export async function promptConfirm(message: string, initialValue = false): Promise<boolean> {
  const answer = await p.confirm({ initialValue, message });
  if (isCancelled(answer)) {
    handleCancellation();
  }
  return answer;
}

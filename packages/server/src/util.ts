import { ConfigError } from '@obsidian-vault-mcp/core';

/**
 * Renders a startup failure for stderr. With `debug`, the stack and the
 * chain of causes follow the message.
 */
export function formatError(err: unknown, debug: boolean) {
  let message = err instanceof Error ? err.message : String(err);
  if (!message.trim()) {
    message = 'An unknown error occurred.';
  }
  if (err instanceof ConfigError) {
    message = `Configuration error: ${message}`;
  }
  if (debug && err instanceof Error) {
    message += '\n' + err.stack;
    let cause = err.cause;
    while (cause !== undefined) {
      message +=
        '\nCaused by: ' + (cause instanceof Error ? cause.message : String(cause));
      cause = cause instanceof Error ? cause.cause : undefined;
    }
  }
  return message;
}

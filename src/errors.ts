/**
 * errors.ts — error taxonomy for the chat core.
 *
 * Skill-side errors (Validation / NotFound / NoHandler) are rendered back to
 * the model as tool messages. ProviderError aborts the current turn.
 * PersistenceError is only ever logged.
 */

export class ValidationError extends Error {
  override readonly name = 'ValidationError';
}

export class NotFoundError extends Error {
  override readonly name = 'NotFoundError';

  constructor(readonly skill: string) {
    super(`skill not found: ${skill}`);
  }
}

export class NoHandlerError extends Error {
  override readonly name = 'NoHandlerError';

  constructor(readonly skill: string) {
    super(`no handler for skill: ${skill}`);
  }
}

export class ProviderError extends Error {
  override readonly name = 'ProviderError';

  constructor(message: string, readonly status?: number, options?: ErrorOptions) {
    super(message, options);
  }
}

export class PersistenceError extends Error {
  override readonly name = 'PersistenceError';

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Stable error type name for tool-result payloads */
export function errorType(err: unknown): string {
  return err instanceof Error ? err.name : 'Error';
}

/**
 * Error taxonomy
 *
 * Setup-time errors (configuration, lookup) are thrown.
 * Backend and validator failures are recovered into result data by the
 * runner and matcher; the classes exist so callers can tell them apart.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class DuplicateNameError extends ConfigurationError {
  constructor(readonly duplicateName: string) {
    super(`Test baseline '${duplicateName}' is already registered`);
    this.name = 'DuplicateNameError';
  }
}

export class NotFoundError extends Error {
  constructor(readonly requestedName: string, readonly availableNames: string[]) {
    super(
      `Test baseline '${requestedName}' not found. ` +
        `Available tests: ${availableNames.length > 0 ? availableNames.join(', ') : '(none)'}`
    );
    this.name = 'NotFoundError';
  }
}

export class BackendExecutionError extends Error {
  constructor(readonly backendName: string, message: string) {
    super(message);
    this.name = 'BackendExecutionError';
  }
}

export class BackendTimeoutError extends BackendExecutionError {
  constructor(backendName: string, readonly timeoutMs: number) {
    super(backendName, `Backend '${backendName}' timed out after ${timeoutMs}ms`);
    this.name = 'BackendTimeoutError';
  }
}

export class ValidatorError extends Error {
  constructor(readonly validatorName: string, cause: unknown) {
    super(`validator error: ${errorMessage(cause)}`);
    this.name = 'ValidatorError';
  }
}

/**
 * Message of anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

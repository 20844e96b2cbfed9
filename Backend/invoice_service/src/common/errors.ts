interface ErrorWithMessage {
  message: string;
}

function isErrorWithMessage(error: unknown): error is ErrorWithMessage {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

export function getErrorMessage(error: unknown): string {
  if (isErrorWithMessage(error)) {
    return error.message;
  }
  return String(error);
}

/**
 * Document illisible ou sans texte exploitable.
 */
export class ExtractionError extends Error {
  constructor(
    message: string,
    readonly filename?: string,
  ) {
    super(message);
    this.name = 'ExtractionError';
  }
}

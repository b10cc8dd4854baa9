export class UnknownElectrodeError extends Error {
  readonly electrode: string;

  constructor(electrode: string) {
    super(`Unknown reference electrode: ${electrode}`);
    this.name = 'UnknownElectrodeError';
    this.electrode = electrode;
  }
}

export function isUnknownElectrodeError(error: unknown): error is UnknownElectrodeError {
  if (error == null) {
    return false;
  }

  if (error instanceof UnknownElectrodeError) {
    return true;
  }

  const maybeError = error as { name?: unknown; electrode?: unknown };
  return maybeError.name === 'UnknownElectrodeError' && typeof maybeError.electrode === 'string';
}

export function errorMessage(error: unknown, fallback: string): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  if (typeof error === 'string' && error.length > 0) {
    return error;
  }
  return fallback;
}

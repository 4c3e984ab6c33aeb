export class PendingSessionConflictError extends Error {
  constructor(readonly userId: string) {
    super(`User ${userId} already has a pending card session`);
    this.name = 'PendingSessionConflictError';
  }
}

export class DuplicateScoreEntryError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} has already been scored`);
    this.name = 'DuplicateScoreEntryError';
  }
}

export class DeliveryFailureError extends Error {
  constructor(
    message: string,
    readonly permanent: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DeliveryFailureError';
  }
}

export function isDuplicateKeyError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 11000
  );
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export class HealthCheckError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HealthCheckError';
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Message for a fatal error, with the message of its cause appended.
 */
export function formatFatalError(error: unknown): string {
  const message = messageOf(error);
  if (error instanceof Error && error.cause !== undefined) {
    return `${message}: ${messageOf(error.cause)}`;
  }
  return message;
}

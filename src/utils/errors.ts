/**
 * Raised by a mail transport when a message could not be handed to the server.
 */
export class DeliveryError extends Error {
  readonly recipient: string;

  constructor(recipient: string, cause: unknown) {
    super(`Could not deliver mail to ${recipient}: ${describeError(cause)}`, { cause });
    this.name = 'DeliveryError';
    this.recipient = recipient;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

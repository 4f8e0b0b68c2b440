/**
 * Raised when the webhook rejects a message
 */
export class NotificationError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotificationError';
    this.status = status;
  }
}

/**
 * Raised when the persisted seen-set cannot be read or written.
 * Always fatal for the run.
 */
export class SeenStoreError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SeenStoreError';
    this.path = path;
  }
}

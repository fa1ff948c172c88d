/**
 * Raised when the inputs to a game state computation are unusable
 * (empty lineup, malformed event). Never retried.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

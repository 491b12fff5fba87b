// ============================================================================
// Feedback Error Types - Input validation failures
// ============================================================================

/**
 * Thrown when caller-supplied input cannot be turned into a valid record or
 * query: empty text, an out-of-range NPS score, an unknown enum value.
 * Messages name the offending field but never echo feedback text.
 */
export class FeedbackValidationError extends Error {
  readonly field: string | null;

  constructor(message: string, field: string | null = null) {
    super(message);
    this.name = 'FeedbackValidationError';
    this.field = field;
  }
}

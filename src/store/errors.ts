// ============================================================================
// Store Error Types - Typed errors for persistence failures
// ============================================================================

/**
 * Base error for backend failures. Carries the store operation that failed
 * and the driver error as `cause`.
 */
export class StoreError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, cause?: unknown) {
    super(`${operation} failed: ${message}`, { cause });
    this.name = 'StoreError';
    this.operation = operation;
  }
}

/**
 * Thrown when an embedding's length differs from the store's configured
 * dimensionality. Mixed lengths would make similarity scores meaningless.
 */
export class EmbeddingDimensionError extends StoreError {
  readonly expected: number;
  readonly actual: number;

  constructor(operation: string, expected: number, actual: number) {
    super(operation, `embedding has ${actual} dimensions, store expects ${expected}`);
    this.name = 'EmbeddingDimensionError';
    this.expected = expected;
    this.actual = actual;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function assertEmbeddingDimensions(
  operation: string,
  embedding: readonly number[] | null | undefined,
  expected: number,
): void {
  if (embedding && embedding.length !== expected) {
    throw new EmbeddingDimensionError(operation, expected, embedding.length);
  }
}

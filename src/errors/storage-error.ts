/**
 * Raised by a repository when a write violates a uniqueness constraint
 */
export class UniqueConstraintError extends Error {
  constructor(
    readonly constraint: string,
    options?: { cause?: unknown }
  ) {
    super(`Unique constraint violated: ${constraint}`, options);
    this.name = 'UniqueConstraintError';
  }
}

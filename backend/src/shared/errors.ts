/**
 * shared/errors.ts — Error types carried through to the HTTP layer
 *
 * Anything with a `status` is answered with that status by the
 * error handler in server.ts; everything else becomes a 500.
 */

export class AppError extends Error {
  readonly status: number;
  readonly details?: string[];

  constructor(message: string, status = 500, details?: string[]) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.details = details;
  }
}

/** Selection rejected by the predicate builder. The last good bundle stays in place. */
export class InvalidCriteriaError extends AppError {
  constructor(details: string[]) {
    super('Invalid filter criteria', 400, details);
  }
}

/** A row reached the core without the fields ingestion guarantees. */
export class DatasetContractError extends AppError {
  readonly rowId: number;

  constructor(rowId: number, field: string) {
    super(`Row ${rowId} has no ${field}`, 500);
    this.rowId = rowId;
  }
}

export const notFound = (message: string): AppError => new AppError(message, 404);

export function statusOf(err: unknown): number {
  if (err instanceof AppError) return err.status;
  // body-parser and other http-errors carry their own status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number') return err.status;
  return 500;
}

export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 400,
    public details?: Array<{ field: string; message: string }>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id?: string) {
    super('NOT_FOUND', id ? `${entity} ${id} not found` : `${entity} not found`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string = 'Validation failed',
    details?: Array<{ field: string; message: string }>,
  ) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

export class EmptyCatalogError extends AppError {
  constructor() {
    super('EMPTY_CATALOG', 'Cannot sample a basket from an empty catalog', 422);
  }
}

export class EmptyCustomerPoolError extends AppError {
  constructor() {
    super('EMPTY_CUSTOMER_POOL', 'Cannot simulate orders without at least one buyer', 422);
  }
}

/**
 * Raised when the caller asked for existing sales history to be cleared and the
 * delete did not commit. Nothing was removed: the clear runs as one atomic scope.
 */
export class SalesHistoryClearError extends AppError {
  constructor(public readonly original: unknown) {
    const reason = original instanceof Error ? original.message : String(original);
    super('SALES_HISTORY_CLEAR_FAILED', `Failed to clear existing sales history: ${reason}`, 500);
  }
}

/** Reads a Postgres SQLSTATE (or any driver `code`) off an unknown error value. */
export function getErrorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  const code = err.code;
  return typeof code === 'string' ? code : undefined;
}

export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

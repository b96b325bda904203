export type ErrorCode =
  | 'INPUT_INVALID'
  | 'NOT_FOUND'
  | 'PRICE_FETCH_FAILED'
  | 'PERSISTENCE_FAILED'
  | 'ANALYSIS_IN_PROGRESS'
  | 'ANALYSIS_ABORTED';

export type FieldErrors = Record<string, string[]>;

export class PortfolioError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed numeric or id input at the lot store boundary. Recoverable. */
export class InputError extends PortfolioError {
  readonly fieldErrors: FieldErrors;

  constructor(message: string, fieldErrors: FieldErrors = {}) {
    super('INPUT_INVALID', message);
    this.fieldErrors = fieldErrors;
  }
}

export class NotFoundError extends PortfolioError {
  readonly id: number;

  constructor(id: number) {
    super('NOT_FOUND', `Lot ${id} not found`);
    this.id = id;
  }
}

export class PriceFetchError extends PortfolioError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PRICE_FETCH_FAILED', message, options);
  }
}

export class PersistenceError extends PortfolioError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_FAILED', message, options);
  }
}

export class AnalysisInProgressError extends PortfolioError {
  constructor() {
    super('ANALYSIS_IN_PROGRESS', 'An analysis run is already in progress');
  }
}

export class AnalysisAbortedError extends PortfolioError {
  constructor() {
    super('ANALYSIS_ABORTED', 'Analysis run aborted before history was written');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toLogObject(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) return { message: String(error) };
  const out: Record<string, unknown> = { name: error.name, message: error.message };
  if (error instanceof PortfolioError) out.code = error.code;
  if (error instanceof InputError && Object.keys(error.fieldErrors).length) out.fieldErrors = error.fieldErrors;
  if (error.cause !== undefined) out.cause = toLogObject(error.cause);
  return out;
}

/** Runs a storage call, rethrowing driver failures as PersistenceError. */
export function withPersistence<T>(action: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof PortfolioError) throw error;
    throw new PersistenceError(`Failed to ${action}: ${errorMessage(error)}`, { cause: error });
  }
}

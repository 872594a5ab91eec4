// Domain errors and result wrappers
// Every failure a caller can recover from is returned, never thrown.

export type StudioErrorCode =
  | 'VALIDATION_FAILED'
  | 'HALL_NOT_AVAILABLE'
  | 'CLIENT_NOT_FOUND'
  | 'NO_HALLS';

export class StudioError extends Error {
  constructor(
    public readonly code: StudioErrorCode,
    message: string,
    public readonly metadata?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'StudioError';
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends StudioError {
  public readonly issues: ValidationIssue[];

  constructor(
    public readonly field: string,
    message: string,
    issues?: ValidationIssue[]
  ) {
    super('VALIDATION_FAILED', message, { field });
    this.name = 'ValidationError';
    this.issues = issues ?? [{ path: field, message }];
  }
}

export class HallNotAvailableError extends StudioError {
  constructor(
    public readonly hallNumber: number,
    public readonly date: string,
    public readonly time: string
  ) {
    super('HALL_NOT_AVAILABLE', `Hall ${hallNumber} is already booked on ${date} at ${time}`, {
      hallNumber,
      date,
      time,
    });
    this.name = 'HallNotAvailableError';
  }
}

export class ClientNotFoundError extends StudioError {
  constructor(public readonly clientLabel: string) {
    super('CLIENT_NOT_FOUND', `No client matching ${clientLabel}`, { clientLabel });
    this.name = 'ClientNotFoundError';
  }
}

export class NoHallsError extends StudioError {
  constructor() {
    super('NO_HALLS', 'The catalog has no halls');
    this.name = 'NoHallsError';
  }
}

export type Result<T, E extends StudioError = StudioError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends StudioError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

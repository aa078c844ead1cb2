// Error types surfaced to HTTP callers. Anything else maps to a 500.

export class AppError extends Error {
  readonly status: 400 | 404 | 500;

  constructor(message: string, status: 400 | 404 | 500 = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`, 404);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorStatus(error: unknown): 400 | 404 | 500 {
  return error instanceof AppError ? error.status : 500;
}

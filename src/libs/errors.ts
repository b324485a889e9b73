export class AppError extends Error {
  constructor(message: string, readonly status = 500, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Request body is not parseable as JSON. */
export class MalformedPayloadError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 400, options);
  }
}

/** Persistence failed or did not answer in time. */
export class StorageError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 500, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

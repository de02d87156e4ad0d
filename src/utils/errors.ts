export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/** A unique or foreign key rejected an insert that has no merge policy. */
export class ConstraintViolationError extends AppError {
  constructor(
    public operation: string,
    public constraint: string | undefined,
    public originalError: Error
  ) {
    super(409, `${operation} violated ${constraint ?? 'a constraint'}: ${originalError.message}`, true);
    Object.setPrototypeOf(this, ConstraintViolationError.prototype);
  }
}

/** A stored value could not be decoded back into its declared shape. */
export class SerializationError extends AppError {
  constructor(
    public table: string,
    public detail: string
  ) {
    super(500, `Unreadable ${table} row: ${detail}`, false);
    Object.setPrototypeOf(this, SerializationError.prototype);
  }
}

export class ConnectivityError extends ServiceError {
  constructor(service: string, operation: string, originalError: Error) {
    super(service, operation, originalError, true);
    Object.setPrototypeOf(this, ConnectivityError.prototype);
  }
}

export class ConfigurationError extends Error {
  constructor(public fields: Record<string, string[] | undefined>) {
    super(
      `Invalid configuration: ${Object.entries(fields)
        .map(([field, issues]) => `${field} (${(issues ?? []).join('; ')})`)
        .join(', ')}`
    );
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'EPIPE',
]);

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

function constraintName(error: Error): string | undefined {
  const constraint: unknown = Reflect.get(error, 'constraint');
  return typeof constraint === 'string' ? constraint : undefined;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Maps a driver failure onto the ledger taxonomy. Errors already classified,
 * and anything unrecognised, are returned unchanged.
 */
export function classifyDatabaseError(operation: string, error: unknown): Error {
  const err = toError(error);
  if (err instanceof AppError || err instanceof ServiceError) {
    return err;
  }

  const code = errorCode(err);
  if (code === '23505' || code === '23503') {
    return new ConstraintViolationError(operation, constraintName(err), err);
  }
  if (
    (code !== undefined && (CONNECTION_ERROR_CODES.has(code) || code.startsWith('08') || code.startsWith('57P') || code === '57014')) ||
    /timeout|Connection terminated/i.test(err.message)
  ) {
    return new ConnectivityError('postgres', operation, err);
  }
  return err;
}

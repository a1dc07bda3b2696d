export interface TechnicalError {
  status?: number;
  code: string;
  message: string;
  payload?: unknown;
  cause?: unknown;
}

/**
 * The one error kind the client raises: transport failures, timeouts,
 * non-2xx responses, unreadable bodies and rejected arguments all surface
 * as an OpenFmbError distinguished by `code`.
 */
export class OpenFmbError extends Error implements TechnicalError {
  status?: number;
  code: string;
  payload?: unknown;
  cause?: unknown;

  constructor(input: TechnicalError) {
    super(input.message);
    this.name = "OpenFmbError";
    this.status = input.status;
    this.code = input.code;
    this.payload = input.payload;
    this.cause = input.cause;
  }

  toString(): string {
    if (this.status !== undefined) {
      return `${this.message} (status_code=${this.status})`;
    }
    return this.message;
  }
}

export function asTechnicalError(error: unknown): TechnicalError {
  if (error instanceof OpenFmbError) {
    return {
      status: error.status,
      code: error.code,
      message: error.message,
      payload: error.payload,
      cause: error.cause
    };
  }

  if (error instanceof Error) {
    return {
      code: "client.unexpected_error",
      message: error.message,
      cause: error
    };
  }

  return {
    code: "client.unknown_error",
    message: String(error)
  };
}

export function invalidArgument(field: string, value: unknown, message: string): OpenFmbError {
  return new OpenFmbError({
    code: "client.invalid_argument",
    message,
    payload: { field, value }
  });
}

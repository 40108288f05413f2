export class ScaffoldError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    public readonly data?: Record<string, unknown>,
    public readonly hint?: string,
    public readonly cause?: Error,
    public readonly isOperational: boolean = true,
    public readonly timestamp: Date = new Date(),
  ) {
    super(message);
    this.name = "ScaffoldError";
  }
}

/**
 * Wraps whatever an I/O call threw into a ScaffoldError with the given code.
 * An existing ScaffoldError passes through untouched.
 */
export function wrapError(
  error: unknown,
  code: string,
  message: string,
  details?: Record<string, unknown>,
  hint?: string,
): ScaffoldError {
  if (error instanceof ScaffoldError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new ScaffoldError(
    `${message}: ${cause.message}`,
    code,
    { ...details, reason: cause.message },
    undefined,
    hint,
    cause,
    true,
  );
}

export function toUserMessage(err: unknown): { message: string; code?: string } {
  if (err instanceof ScaffoldError) {
    return { message: err.message, code: err.code };
  } else if (err instanceof Error) {
    return { message: err.message };
  } else {
    return { message: String(err) };
  }
}

// /src/lib/errors.ts

/**
 * Any failure coming back from the remote API: transport errors,
 * non-2xx responses, `{ error: true }` envelopes and payloads that do not
 * match the expected shape. Callers treat them all the same way.
 */
export class RemoteFailure extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'RemoteFailure';
    this.status = options.status;
  }
}

export class ConfigError extends Error {
  constructor(message: string, readonly variable: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class SessionError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'SessionError';
  }
}

// Human-readable description of any thrown value
export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message || error.name;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
};

export interface OperationFailure {
  message: string;   // e.g. "Failed to delete task: network"
  reason: string;    // the underlying error's own message
}

export const operationFailure = (action: string, error: unknown): OperationFailure => {
  const reason = describeError(error);
  return { message: `${action}: ${reason}`, reason };
};

import { inspect } from "node:util";

export type FetchErrorCode = "ERR_HTTP_ERROR" | "ERR_FETCH_TIMEOUT" | "ERR_FETCH_FAILED";

export interface FetchErrorDetails {
  name: string;
  message: string;
  code?: string | number;
  statusCode?: number;
  url?: string;
  originalError?: FetchErrorDetails;
}

/**
 * Error raised for any failed page request: network failure, timeout or a non-2xx status.
 */
export class FetchError extends Error {
  /** Which kind of failure occurred. */
  public readonly code: FetchErrorCode;
  /** The URL that was requested. */
  public readonly url?: string;
  /** The original error object, if available. */
  public readonly originalError?: Error;
  /** HTTP status code, if relevant. */
  public readonly statusCode?: number;

  constructor(message: string, code: FetchErrorCode, options: { url?: string; originalError?: Error; statusCode?: number } = {}) {
    super(message);
    this.name = "FetchError";
    this.code = code;
    this.url = options.url;
    this.originalError = options.originalError;
    this.statusCode = options.statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FetchError);
    }
  }

  /** True when the request timed out rather than failing outright. */
  get isTimeout(): boolean {
    return this.code === "ERR_FETCH_TIMEOUT";
  }

  /**
   * Returns a plain object representation with only useful metadata for logging.
   */
  toObject(): FetchErrorDetails {
    const descriptor: FetchErrorDetails = {
      name: this.name,
      message: this.message,
      code: this.code,
    };

    if (this.statusCode !== undefined) {
      descriptor.statusCode = this.statusCode;
    }

    if (this.url !== undefined) {
      descriptor.url = this.url;
    }

    const original = serializeUnknownError(this.originalError);
    if (original) {
      descriptor.originalError = original;
    }

    return descriptor;
  }

  toJSON(): FetchErrorDetails {
    return this.toObject();
  }

  [inspect.custom](): FetchErrorDetails {
    return this.toObject();
  }
}

/**
 * Raised when configuration values from the environment fail validation.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * One-line description of an unknown thrown value, for log output.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : String(error);
}

function serializeUnknownError(error: unknown): FetchErrorDetails | undefined {
  if (!error) {
    return undefined;
  }

  if (error instanceof FetchError) {
    return error.toObject();
  }

  if (error instanceof Error) {
    const descriptor: FetchErrorDetails = {
      name: error.name || "Error",
      message: error.message,
    };

    const withCode: unknown = Reflect.get(error, "code");
    if (typeof withCode === "string" || typeof withCode === "number") {
      descriptor.code = withCode;
    }

    const nestedDescriptor = serializeUnknownError(error.cause);
    if (nestedDescriptor) {
      descriptor.originalError = nestedDescriptor;
    }

    return descriptor;
  }

  return {
    name: "Error",
    message: typeof error === "string" ? error : String(error),
  };
}

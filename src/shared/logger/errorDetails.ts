import type { AppBoundaryError } from "../../core/entities/appError";

export type ErrorDetails = {
  name?: string;
  message: string;
  stack?: string;
  code?: AppBoundaryError["code"];
  provider?: string;
  cause?: ErrorDetails;
};

const MAX_CAUSE_DEPTH = 4;

const isBoundaryError = (value: unknown): value is AppBoundaryError =>
  typeof value === "object" &&
  value !== null &&
  "code" in value &&
  "provider" in value &&
  "message" in value &&
  typeof value.message === "string" &&
  typeof value.provider === "string";

/**
 * Flattens an error and its `cause` chain for a pino log line. Discovery
 * aborts carry the adapter's boundary error as their cause.
 */
export const toErrorDetails = (error: unknown, depth = 0): ErrorDetails => {
  if (isBoundaryError(error)) {
    return {
      message: error.message,
      code: error.code,
      provider: error.provider,
    };
  }

  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  const details: ErrorDetails = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error.cause !== undefined && depth < MAX_CAUSE_DEPTH) {
    details.cause = toErrorDetails(error.cause, depth + 1);
  }
  return details;
};

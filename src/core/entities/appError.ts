/**
 * Describes canonical error categories used at adapter boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "transport_error"
  | "malformed_response"
  | "config_invalid";

/**
 * A normalized boundary failure that keeps the adapter and target it came from.
 */
export type AppBoundaryError = {
  source: "discovery" | "fetch";
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

export const describeBoundaryError = (error: AppBoundaryError): string =>
  `${error.code}: ${error.message}`;

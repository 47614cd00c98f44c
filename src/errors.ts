/**
 * FreshBooks Error Handling
 */

/** Error codes for FreshBooks client failures */
export const FB_ERROR_CODES = {
  NETWORK_ERROR: "FB_NETWORK_ERROR",
  HTTP_ERROR: "FB_HTTP_ERROR",
  DECODE_ERROR: "FB_DECODE_ERROR",
  TIMESTAMP_PARSE_ERROR: "FB_TIMESTAMP_PARSE_ERROR",
  SERVICE_ERROR: "FB_SERVICE_ERROR",
  OAUTH_ERROR: "FB_OAUTH_ERROR",
  INVALID_REQUEST: "FB_INVALID_REQUEST",
  INVALID_CONFIG: "FB_INVALID_CONFIG",
} as const;

export type FreshBooksErrorCode = (typeof FB_ERROR_CODES)[keyof typeof FB_ERROR_CODES];

/** Custom error class for FreshBooks-related errors */
export class FreshBooksError extends Error {
  constructor(
    message: string,
    public code: FreshBooksErrorCode,
    public status?: number,
    public details?: unknown
  ) {
    super(message);
    this.name = "FreshBooksError";
  }
}

/** Normalize anything thrown while talking to the API */
export function handleFreshBooksError(error: unknown): FreshBooksError {
  if (error instanceof FreshBooksError) {
    return error;
  }

  // fetch rejects with a TypeError ("fetch failed") on connection problems
  if (error instanceof TypeError && error.message.includes("fetch")) {
    return new FreshBooksError(
      "Network error connecting to FreshBooks API",
      FB_ERROR_CODES.NETWORK_ERROR,
      0,
      error
    );
  }

  if (error instanceof Error) {
    return new FreshBooksError(error.message, FB_ERROR_CODES.NETWORK_ERROR, 0, error);
  }

  return new FreshBooksError(
    "An unexpected error occurred with FreshBooks integration",
    FB_ERROR_CODES.NETWORK_ERROR,
    0,
    error
  );
}

/**
 * Credential selection for API requests
 */

import type { OAuthCredential } from "./types.js";
import { FreshBooksError, FB_ERROR_CODES } from "./errors.js";

/** Password sent alongside an API token; the service ignores it */
export const TOKEN_PASSWORD = "X";

export type Credential =
  | { kind: "token"; token: string }
  | { kind: "oauth"; token: OAuthCredential };

function isOAuthCredential(value: unknown): value is OAuthCredential {
  return (
    typeof value === "object" &&
    value !== null &&
    "authHeader" in value &&
    typeof value.authHeader === "function"
  );
}

/** Turn constructor input into a credential, rejecting anything else */
export function toCredential(input: unknown): Credential {
  if (typeof input === "string") {
    return { kind: "token", token: input };
  }
  if (isOAuthCredential(input)) {
    return { kind: "oauth", token: input };
  }
  throw new FreshBooksError(
    "credential must be an API token string or an OAuth token",
    FB_ERROR_CODES.INVALID_CONFIG
  );
}

/**
 * Authorization header for a request, or undefined when there is nothing to
 * send. An unauthenticated request is still sent; the service rejects it.
 */
export function authorizationHeader(credential: Credential): string | undefined {
  switch (credential.kind) {
    case "token": {
      if (!credential.token) return undefined;
      const encoded = Buffer.from(`${credential.token}:${TOKEN_PASSWORD}`).toString("base64");
      return `Basic ${encoded}`;
    }
    case "oauth":
      return credential.token.authHeader();
  }
}

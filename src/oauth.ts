/**
 * OAuth 1.0a for FreshBooks, PLAINTEXT signature method
 *
 * FreshBooks classic only accepts PLAINTEXT over HTTPS, so there is no
 * request signing beyond concatenating the two secrets.
 */

import type { OAuthCredential } from "./types.js";
import { FreshBooksError, FB_ERROR_CODES, handleFreshBooksError } from "./errors.js";
import { accountUrl } from "./transport.js";

/** OAuth endpoints, relative to the account URL */
const ENDPOINTS = {
  request: "/oauth/oauth_request.php",
  authorize: "/oauth/oauth_authorize.php",
  access: "/oauth/oauth_access.php",
} as const;

/** Consumer registered with FreshBooks plus the account it acts on */
export interface OAuthConfig {
  account: string;
  consumerKey: string;
  consumerSecret: string;
  domain?: string;
  /** Value of the header's realm field, empty by default */
  realm?: string;
}

/** Temporary token returned by the first leg of the flow */
export interface RequestToken {
  token: string;
  tokenSecret: string;
}

export interface OAuthTokenOptions {
  consumerKey: string;
  consumerSecret: string;
  token: string;
  tokenSecret: string;
  realm?: string;
}

/** RFC 3986 percent-encoding, stricter than encodeURIComponent */
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Generate a random nonce
 */
export function generateNonce(): string {
  const array = new Uint8Array(16);
  crypto.getRandomValues(array);
  return Array.from(array, (byte) => byte.toString(16).padStart(2, "0")).join("");
}

function plaintextSignature(consumerSecret: string, tokenSecret = ""): string {
  return `${percentEncode(consumerSecret)}&${percentEncode(tokenSecret)}`;
}

function buildHeader(realm: string, params: Array<[string, string]>): string {
  const fields = params.map(([key, value]) => `${key}="${percentEncode(value)}"`);
  return `OAuth realm="${percentEncode(realm)}",${fields.join(",")}`;
}

function oauthParams(
  consumerKey: string,
  extra: Array<[string, string]>,
  signature: string
): Array<[string, string]> {
  return [
    ["oauth_version", "1.0"],
    ["oauth_consumer_key", consumerKey],
    ...extra,
    ["oauth_timestamp", String(Math.floor(Date.now() / 1000))],
    ["oauth_nonce", generateNonce()],
    ["oauth_signature_method", "PLAINTEXT"],
    ["oauth_signature", signature],
  ];
}

/** Access token that signs API requests */
export class OAuthToken implements OAuthCredential {
  readonly consumerKey: string;
  readonly token: string;
  readonly realm: string;
  private readonly consumerSecret: string;
  private readonly tokenSecret: string;

  constructor(options: OAuthTokenOptions) {
    this.consumerKey = options.consumerKey;
    this.consumerSecret = options.consumerSecret;
    this.token = options.token;
    this.tokenSecret = options.tokenSecret;
    this.realm = options.realm ?? "";
  }

  /** Authorization header value for one request (fresh nonce and timestamp) */
  authHeader(): string {
    return buildHeader(
      this.realm,
      oauthParams(
        this.consumerKey,
        [["oauth_token", this.token]],
        plaintextSignature(this.consumerSecret, this.tokenSecret)
      )
    );
  }
}

async function postForToken(url: string, authorization: string, step: string): Promise<RequestToken> {
  let response: Response;
  let text: string;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: { Authorization: authorization },
    });
    text = await response.text();
  } catch (error) {
    throw handleFreshBooksError(error);
  }

  if (!response.ok) {
    throw new FreshBooksError(
      `Failed to ${step}: ${response.status}`,
      FB_ERROR_CODES.OAUTH_ERROR,
      response.status,
      text
    );
  }

  const params = new URLSearchParams(text);
  const token = params.get("oauth_token");
  const tokenSecret = params.get("oauth_token_secret");
  if (!token || tokenSecret === null) {
    throw new FreshBooksError(
      `Failed to ${step}: reply has no token`,
      FB_ERROR_CODES.OAUTH_ERROR,
      response.status,
      text
    );
  }

  return { token, tokenSecret };
}

/**
 * First leg: obtain a request token for the given callback
 */
export async function getRequestToken(
  config: OAuthConfig,
  callbackUrl: string
): Promise<RequestToken> {
  const header = buildHeader(
    config.realm ?? "",
    oauthParams(
      config.consumerKey,
      [["oauth_callback", callbackUrl]],
      plaintextSignature(config.consumerSecret)
    )
  );

  return postForToken(
    `${accountUrl(config.account, config.domain)}${ENDPOINTS.request}`,
    header,
    "get request token"
  );
}

/**
 * Second leg: URL the user visits to approve the request token
 */
export function generateAuthUrl(config: OAuthConfig, requestToken: RequestToken): string {
  const params = new URLSearchParams({ oauth_token: requestToken.token });
  return `${accountUrl(config.account, config.domain)}${ENDPOINTS.authorize}?${params.toString()}`;
}

/**
 * Third leg: trade the approved request token and verifier for an access token
 */
export async function exchangeRequestToken(
  config: OAuthConfig,
  requestToken: RequestToken,
  verifier: string
): Promise<OAuthToken> {
  const header = buildHeader(
    config.realm ?? "",
    oauthParams(
      config.consumerKey,
      [
        ["oauth_token", requestToken.token],
        ["oauth_verifier", verifier],
      ],
      plaintextSignature(config.consumerSecret, requestToken.tokenSecret)
    )
  );

  const access = await postForToken(
    `${accountUrl(config.account, config.domain)}${ENDPOINTS.access}`,
    header,
    "exchange request token"
  );

  return new OAuthToken({
    consumerKey: config.consumerKey,
    consumerSecret: config.consumerSecret,
    token: access.token,
    tokenSecret: access.tokenSecret,
    realm: config.realm,
  });
}

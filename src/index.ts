/**
 * freshbooks-xml-client
 *
 * FreshBooks classic (XML API 2.1) client with token and OAuth 1.0a auth, and typed entities
 */

// Main client
export { FreshBooksClient, LIST_METHODS } from "./client.js";
export type { ListOperation, ListItem, ListItems } from "./client.js";

// Envelopes
export { applyDefaults, serializeRequest, decodeResponse } from "./envelope.js";
export { parseTimestamp, formatDate, formatTimestamp } from "./timestamp.js";

// Auth
export { toCredential, authorizationHeader, TOKEN_PASSWORD } from "./auth.js";
export type { Credential } from "./auth.js";
export {
  OAuthToken,
  getRequestToken,
  generateAuthUrl,
  exchangeRequestToken,
  generateNonce,
  percentEncode,
} from "./oauth.js";
export type { OAuthConfig, OAuthTokenOptions, RequestToken } from "./oauth.js";

// Transport
export { fetchTransport, accountUrl, DEFAULT_DOMAIN } from "./transport.js";
export type { Transport, TransportRequest, TransportResponse } from "./transport.js";

// Errors
export { FreshBooksError, FB_ERROR_CODES, handleFreshBooksError } from "./errors.js";
export type { FreshBooksErrorCode } from "./errors.js";

// Types
export type {
  // Config & Options
  FreshBooksClientOptions,
  CredentialInput,
  OAuthCredential,
  LogLevel,

  // Envelopes
  Request,
  RequestEnvelope,
  ResponseEnvelope,
  ListSection,
  ListResult,
  Pagination,

  // Entities
  Client,
  Project,
  Task,
  User,
  TimeEntry,
  Contractor,
  Invoice,
  LineItem,
} from "./types.js";

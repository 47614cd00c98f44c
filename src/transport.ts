/**
 * HTTP transport used by the client
 */

import { handleFreshBooksError } from "./errors.js";

export const DEFAULT_DOMAIN = "freshbooks.com";

/** https://<account>.<domain> */
export function accountUrl(account: string, domain = DEFAULT_DOMAIN): string {
  return `https://${account}.${domain}`;
}

export interface TransportRequest {
  method: "POST";
  url: string;
  body: string;
  headers: Record<string, string>;
}

export interface TransportResponse {
  status: number;
  statusText: string;
  body: string;
}

/**
 * Sends one request and hands back whatever came back. Status checking is
 * the caller's job; only failures to get a reply at all should reject.
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

/** Transport backed by the global fetch */
export const fetchTransport: Transport = {
  async send(request) {
    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
      });

      return {
        status: response.status,
        statusText: response.statusText,
        body: await response.text(),
      };
    } catch (error) {
      throw handleFreshBooksError(error);
    }
  },
};

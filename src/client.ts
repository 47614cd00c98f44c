/**
 * FreshBooks XML API Client
 *
 * Builds request documents, signs them with the configured credential and
 * decodes the paginated replies into typed records.
 */

import type {
  FreshBooksClientOptions,
  LogLevel,
  Request,
  RequestEnvelope,
  ResponseEnvelope,
  ListResult,
  ListSection,
  Client,
  TimeEntry,
  Contractor,
  Invoice,
} from "./types.js";
import { toCredential, authorizationHeader, type Credential } from "./auth.js";
import { applyDefaults, serializeRequest, decodeResponse } from "./envelope.js";
import { fetchTransport, accountUrl, DEFAULT_DOMAIN, type Transport } from "./transport.js";
import { FreshBooksError, FB_ERROR_CODES } from "./errors.js";

/** API path under the account URL */
const API_PATH = "/api/2.1/xml-in";

const DEFAULT_PER_PAGE = 25;

/** List operations and the API method behind each */
export const LIST_METHODS = {
  clients: "client.list",
  time_entries: "time_entry.list",
  contractors: "contractor.list",
  invoices: "invoice.list",
} as const;

export type ListOperation = keyof typeof LIST_METHODS;

/** Record type returned by each list operation */
export interface ListItems {
  clients: Client;
  time_entries: TimeEntry;
  contractors: Contractor;
  invoices: Invoice;
}

export type ListItem<K extends ListOperation> = ListItems[K];

type ListSections = { [P in ListOperation]: ListSection<ListItems[P]> };

export class FreshBooksClient {
  readonly apiUrl: string;
  readonly perPage: number;
  private credential: Credential;
  private transport: Transport;
  private onLog: FreshBooksClientOptions["onLog"];

  constructor(options: FreshBooksClientOptions) {
    this.validateConfig(options);
    this.apiUrl = `${accountUrl(options.account, options.domain ?? DEFAULT_DOMAIN)}${API_PATH}`;
    this.perPage = options.perPage ?? DEFAULT_PER_PAGE;
    this.credential = toCredential(options.credential);
    this.transport = options.transport ?? fetchTransport;
    this.onLog = options.onLog;
  }

  private validateConfig(options: FreshBooksClientOptions): void {
    if (!options.account) {
      throw new FreshBooksError("account is required", FB_ERROR_CODES.INVALID_CONFIG);
    }
    if (!/^[A-Za-z0-9-]+$/.test(options.account)) {
      throw new FreshBooksError(
        `account "${options.account}" is not a valid subdomain`,
        FB_ERROR_CODES.INVALID_CONFIG
      );
    }
    if (
      options.perPage !== undefined &&
      (!Number.isInteger(options.perPage) || options.perPage < 1)
    ) {
      throw new FreshBooksError("perPage must be a positive integer", FB_ERROR_CODES.INVALID_CONFIG);
    }
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (this.onLog) {
      this.onLog(level, message, data);
    }
  }

  /**
   * Serialize, authenticate and send one request; returns the raw reply body
   */
  private async makeRawRequest(envelope: RequestEnvelope): Promise<string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/xml",
      Accept: "application/xml",
    };

    const authorization = authorizationHeader(this.credential);
    if (authorization) {
      headers.Authorization = authorization;
    }

    this.log("debug", `POST ${envelope.method}`, {
      page: envelope.page,
      per_page: envelope.per_page,
      authenticated: authorization !== undefined,
    });

    const response = await this.transport.send({
      method: "POST",
      url: this.apiUrl,
      body: serializeRequest(envelope),
      headers,
    });

    if (response.status < 200 || response.status > 299) {
      throw new FreshBooksError(
        `${response.status} ${response.statusText}`.trim(),
        FB_ERROR_CODES.HTTP_ERROR,
        response.status,
        response.body
      );
    }

    return response.body;
  }

  /**
   * Run one API method and decode the reply. A non-empty error element
   * fails the call even if list sections came back too.
   */
  private async request(method: string, request: Request): Promise<ResponseEnvelope> {
    const envelope = applyDefaults(request, method, this.perPage);
    const body = await this.makeRawRequest(envelope);
    const response = decodeResponse(body);

    if (response.error.length > 0) {
      throw new FreshBooksError(response.error, FB_ERROR_CODES.SERVICE_ERROR, undefined, {
        method,
      });
    }

    return response;
  }

  private async list<K extends ListOperation>(
    operation: K,
    request: Request
  ): Promise<ListResult<ListItem<K>>> {
    const sections: ListSections = await this.request(LIST_METHODS[operation], request);
    const section = sections[operation];

    this.log("debug", `${LIST_METHODS[operation]} returned ${section.items.length} items`, section.pagination);

    return { items: section.items, pagination: section.pagination };
  }

  // ============================================
  // List Methods
  // ============================================

  async listClients(request: Request = {}): Promise<ListResult<Client>> {
    return this.list("clients", request);
  }

  async listTimeEntries(request: Request = {}): Promise<ListResult<TimeEntry>> {
    return this.list("time_entries", request);
  }

  async listContractors(request: Request = {}): Promise<ListResult<Contractor>> {
    return this.list("contractors", request);
  }

  async listInvoices(request: Request = {}): Promise<ListResult<Invoice>> {
    return this.list("invoices", request);
  }

  /**
   * Fetch every page of a list operation, starting at request.page
   */
  async listAll<K extends ListOperation>(
    operation: K,
    request: Request = {}
  ): Promise<Array<ListItem<K>>> {
    const allResults: Array<ListItem<K>> = [];
    let page = request.page !== undefined && request.page >= 1 ? request.page : 1;

    while (true) {
      const { items, pagination } = await this.list(operation, { ...request, page });
      allResults.push(...items);

      const perPage = pagination.per_page > 0 ? pagination.per_page : items.length;
      if (items.length === 0 || page * perPage >= pagination.total) {
        break;
      }

      page += 1;
    }

    this.log("debug", `${LIST_METHODS[operation]} fetched ${allResults.length} items in total`);

    return allResults;
  }
}

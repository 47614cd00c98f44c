/**
 * FreshBooks Client Types
 */

import type { Transport } from "./transport.js";

/** Anything that can sign a request with an OAuth Authorization header */
export interface OAuthCredential {
  authHeader(): string;
}

/** Credential accepted by the client constructor */
export type CredentialInput = string | OAuthCredential;

/** Log levels passed to the onLog hook */
export type LogLevel = "debug" | "info" | "warn" | "error";

/** Options for initializing the client */
export interface FreshBooksClientOptions {
  /** Account subdomain, e.g. "acme" for acme.freshbooks.com */
  account: string;
  /** API token string or an OAuth token object */
  credential: CredentialInput;
  /** Default page size for list calls (25) */
  perPage?: number;
  /** Service domain, defaults to freshbooks.com */
  domain?: string;
  /** HTTP transport, defaults to the global fetch */
  transport?: Transport;
  /** Optional logging hook */
  onLog?: (level: LogLevel, message: string, data?: unknown) => void;
}

// ============================================
// Envelopes
// ============================================

/** Caller-supplied request: pagination plus optional filters */
export interface Request {
  /** Always replaced by the invoked operation */
  method?: string;
  page?: number;
  per_page?: number;

  email?: string;
  username?: string;
  date_from?: Date;
  date_to?: Date;
  update_from?: Date;
  update_to?: Date;
  task_id?: string;
  project_id?: string;
  client_id?: string;
  invoice_id?: string;
  time_entry?: Partial<TimeEntry>;
}

/** Request with method and pagination filled in */
export interface RequestEnvelope extends Request {
  method: string;
  page: number;
  per_page: number;
}

export interface Pagination {
  page: number;
  total: number;
  per_page: number;
  pages?: number;
}

export interface ListSection<T> {
  pagination: Pagination;
  items: T[];
}

/**
 * Decoded reply. Only the section matching the invoked method is filled in
 * by the service; an empty section elsewhere says nothing about success.
 */
export interface ResponseEnvelope {
  error: string;
  clients: ListSection<Client>;
  projects: ListSection<Project>;
  tasks: ListSection<Task>;
  staff_members: ListSection<User>;
  time_entries: ListSection<TimeEntry>;
  contractors: ListSection<Contractor>;
  invoices: ListSection<Invoice>;
}

/** What every list operation resolves to */
export interface ListResult<T> {
  items: T[];
  pagination: Pagination;
}

// ============================================
// Entities
// ============================================

export interface Client {
  client_id: string;
  organization: string;
}

export interface Project {
  project_id: string;
  client_id: string;
  name: string;
  task_ids: number[];
  staff_ids: number[];
}

export interface Task {
  task_id: string;
  name: string;
}

/** Staff member */
export interface User {
  staff_id: string;
  email: string;
  first_name: string;
  last_name: string;
}

export interface TimeEntry {
  time_entry_id: number;
  project_id: number;
  task_id: number;
  staff_id: string;
  date: string;
  notes: string;
  hours: number;
}

export interface Contractor {
  contractor_id: string;
  name: string;
  email: string;
  rate: number;
  task_id: string;
  projects: Project[];
}

export interface Invoice {
  invoice_id: number;
  client_id: number;
  number: string;
  amount: string;
  currency_code: string;
  amount_outstanding: string;
  paid: string;
  date?: Date;
  updated?: Date;
  organization: string;
  lines: LineItem[];
}

export interface LineItem {
  line_id: number;
  amount: string;
  name: string;
  unit_cost: string;
  quantity: number;
  type: string;
}

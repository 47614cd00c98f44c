/**
 * Request and response documents for the XML API
 */

import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import type {
  Client,
  Contractor,
  Invoice,
  LineItem,
  ListSection,
  Pagination,
  Project,
  Request,
  RequestEnvelope,
  ResponseEnvelope,
  Task,
  TimeEntry,
  User,
} from "./types.js";
import { FreshBooksError, FB_ERROR_CODES } from "./errors.js";
import { formatDate, formatTimestamp, parseTimestamp } from "./timestamp.js";

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>\n';

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  format: true,
  indentBy: "  ",
});

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
  // text is handed back as sent; numeric references (&#233;) are decoded
  trimValues: false,
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

// ============================================
// Requests
// ============================================

/**
 * Stamp the method name and fill in pagination. The caller's request is left
 * untouched.
 */
export function applyDefaults(
  request: Request,
  method: string,
  defaultPerPage: number
): RequestEnvelope {
  const page = request.page !== undefined && request.page >= 1 ? request.page : 1;
  const perPage =
    request.per_page !== undefined && request.per_page >= 1 ? request.per_page : defaultPerPage;

  return { ...request, method, page, per_page: perPage };
}

type XmlValue = string | XmlObject;
interface XmlObject {
  [key: string]: XmlValue;
}

const STRING_FILTERS = ["email", "username"] as const;
const DATE_FILTERS = ["date_from", "date_to"] as const;
const TIMESTAMP_FILTERS = ["update_from", "update_to"] as const;
const ID_FILTERS = ["task_id", "project_id", "client_id", "invoice_id"] as const;
const TIME_ENTRY_FIELDS = [
  "time_entry_id",
  "project_id",
  "task_id",
  "staff_id",
  "date",
  "notes",
  "hours",
] as const;

function timeEntryNode(entry: Partial<TimeEntry>): XmlObject {
  const node: XmlObject = {};
  for (const field of TIME_ENTRY_FIELDS) {
    const value = entry[field];
    if (value !== undefined) node[field] = String(value);
  }
  return node;
}

function validDate(key: string, value: Date): Date {
  if (Number.isNaN(value.getTime())) {
    throw new FreshBooksError(
      `${key} is not a valid date`,
      FB_ERROR_CODES.INVALID_REQUEST,
      undefined,
      { [key]: value }
    );
  }
  return value;
}

/** Serialize a defaulted request. Unset filters are left out entirely. */
export function serializeRequest(envelope: RequestEnvelope): string {
  const node: XmlObject = {
    "@_method": envelope.method,
    per_page: String(envelope.per_page),
    page: String(envelope.page),
  };

  for (const key of STRING_FILTERS) {
    const value = envelope[key];
    if (value) node[key] = value;
  }
  for (const key of DATE_FILTERS) {
    const value = envelope[key];
    if (value) node[key] = formatDate(validDate(key, value));
  }
  for (const key of TIMESTAMP_FILTERS) {
    const value = envelope[key];
    if (value) node[key] = formatTimestamp(validDate(key, value));
  }
  for (const key of ID_FILTERS) {
    const value = envelope[key];
    if (value) node[key] = value;
  }
  if (envelope.time_entry) {
    const entry = timeEntryNode(envelope.time_entry);
    if (Object.keys(entry).length > 0) node.time_entry = entry;
  }

  return XML_DECLARATION + builder.build({ request: node });
}

// ============================================
// Responses
// ============================================

type Node = Record<string, unknown>;

function isNode(value: unknown): value is Node {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/** Repeated single-valued elements: the last one wins */
function single(value: unknown): unknown {
  return Array.isArray(value) ? value[value.length - 1] : value;
}

function nodes(value: unknown): Node[] {
  return asArray(value).map((v) => (isNode(v) ? v : {}));
}

function decodeError(message: string, details?: unknown): FreshBooksError {
  return new FreshBooksError(message, FB_ERROR_CODES.DECODE_ERROR, undefined, details);
}

function text(node: Node, key: string): string {
  const value = single(node[key]);
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (isNode(value)) {
    const inner = value["#text"];
    if (typeof inner === "string" || typeof inner === "number") return String(inner);
    if (Object.keys(value).some((k) => !k.startsWith("@_"))) {
      throw decodeError(`Unexpected nested content in <${key}>`);
    }
  }
  return "";
}

function integer(node: Node, key: string): number {
  const raw = text(node, key).trim();
  if (raw === "") return 0;
  if (!/^[+-]?\d+$/.test(raw)) {
    throw decodeError(`Invalid integer "${raw}" in <${key}>`);
  }
  return Number(raw);
}

function decimal(node: Node, key: string): number {
  const raw = text(node, key).trim();
  if (raw === "") return 0;
  if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(raw)) {
    throw decodeError(`Invalid number "${raw}" in <${key}>`);
  }
  return Number(raw);
}

function timestamp(node: Node, key: string): Date | undefined {
  const raw = text(node, key).trim();
  return raw === "" ? undefined : parseTimestamp(raw);
}

function decodePagination(section: Node): Pagination {
  const pagination: Pagination = {
    page: integer(section, "@_page"),
    total: integer(section, "@_total"),
    per_page: integer(section, "@_per_page"),
  };
  if (section["@_pages"] !== undefined) {
    pagination.pages = integer(section, "@_pages");
  }
  return pagination;
}

function decodeSection<T>(
  root: Node,
  name: string,
  itemTag: string,
  decodeItem: (node: Node) => T
): ListSection<T> {
  const raw = single(root[name]);
  const section = isNode(raw) ? raw : {};
  return {
    pagination: decodePagination(section),
    items: nodes(section[itemTag]).map(decodeItem),
  };
}

/** Values found at a nested path, e.g. tasks > task > task_id */
function nested(node: Node, container: string, item: string): Node[] {
  return nodes(node[container]).flatMap((c) => nodes(c[item]));
}

function decodeClient(node: Node): Client {
  return {
    client_id: text(node, "client_id"),
    organization: text(node, "organization"),
  };
}

function decodeProject(node: Node): Project {
  return {
    project_id: text(node, "project_id"),
    client_id: text(node, "client_id"),
    name: text(node, "name"),
    task_ids: nested(node, "tasks", "task").map((task) => integer(task, "task_id")),
    staff_ids: nested(node, "staff", "staff").map((staff) => integer(staff, "staff_id")),
  };
}

function decodeTask(node: Node): Task {
  return {
    task_id: text(node, "task_id"),
    name: text(node, "name"),
  };
}

function decodeUser(node: Node): User {
  return {
    staff_id: text(node, "staff_id"),
    email: text(node, "email"),
    first_name: text(node, "first_name"),
    last_name: text(node, "last_name"),
  };
}

function decodeTimeEntry(node: Node): TimeEntry {
  return {
    time_entry_id: integer(node, "time_entry_id"),
    project_id: integer(node, "project_id"),
    task_id: integer(node, "task_id"),
    staff_id: text(node, "staff_id"),
    date: text(node, "date"),
    notes: text(node, "notes"),
    hours: decimal(node, "hours"),
  };
}

function decodeContractor(node: Node): Contractor {
  return {
    contractor_id: text(node, "contractor_id"),
    name: text(node, "name"),
    email: text(node, "email"),
    rate: decimal(node, "rate"),
    task_id: text(node, "task_id"),
    projects: nested(node, "projects", "project").map(decodeProject),
  };
}

function decodeLineItem(node: Node): LineItem {
  return {
    line_id: integer(node, "line_id"),
    amount: text(node, "amount"),
    name: text(node, "name"),
    unit_cost: text(node, "unit_cost"),
    quantity: decimal(node, "quantity"),
    type: text(node, "type"),
  };
}

function decodeInvoice(node: Node): Invoice {
  return {
    invoice_id: integer(node, "invoice_id"),
    client_id: integer(node, "client_id"),
    number: text(node, "number"),
    amount: text(node, "amount"),
    currency_code: text(node, "currency_code"),
    amount_outstanding: text(node, "amount_outstanding"),
    paid: text(node, "paid"),
    date: timestamp(node, "date"),
    updated: timestamp(node, "updated"),
    organization: text(node, "organization"),
    lines: nested(node, "lines", "line").map(decodeLineItem),
  };
}

/** The document element, whatever it is called */
function rootElement(xml: string): Node {
  if (xml.trim() === "") {
    throw decodeError("Empty response body");
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw decodeError(`Malformed XML at ${line}:${col}: ${msg}`, validation.err);
  }

  const document: unknown = parser.parse(xml);
  if (!isNode(document)) {
    throw decodeError("Response has no document element");
  }
  const names = Object.keys(document).filter((k) => !k.startsWith("?") && !k.startsWith("#"));
  if (names.length === 0) {
    throw decodeError("Response has no document element");
  }
  const root = single(document[names[0]]);
  return isNode(root) ? root : {};
}

/**
 * Decode a reply. Sections absent from the document come back empty; the
 * error text is returned as-is for the caller to act on.
 */
export function decodeResponse(xml: string): ResponseEnvelope {
  const root = rootElement(xml);

  return {
    error: text(root, "error"),
    clients: decodeSection(root, "clients", "client", decodeClient),
    projects: decodeSection(root, "projects", "project", decodeProject),
    tasks: decodeSection(root, "tasks", "task", decodeTask),
    staff_members: decodeSection(root, "staff_members", "member", decodeUser),
    time_entries: decodeSection(root, "time_entries", "time_entry", decodeTimeEntry),
    contractors: decodeSection(root, "contractors", "contractor", decodeContractor),
    invoices: decodeSection(root, "invoices", "invoice", decodeInvoice),
  };
}

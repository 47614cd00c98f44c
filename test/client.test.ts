import { describe, it, expect, beforeEach } from "vitest";
import { XMLParser } from "fast-xml-parser";
import { FreshBooksClient } from "../src/client.js";
import { FreshBooksError, FB_ERROR_CODES } from "../src/errors.js";
import type { Transport, TransportRequest, TransportResponse } from "../src/transport.js";
import type { LogLevel } from "../src/types.js";

const ACCOUNT = "acme";
const API_TOKEN = "test-token";
const API_URL = "https://acme.freshbooks.com/api/2.1/xml-in";

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  ignoreDeclaration: true,
});

/** In-process transport that records requests and answers from a handler */
class FakeTransport implements Transport {
  requests: TransportRequest[] = [];

  constructor(private handler: (request: TransportRequest) => Partial<TransportResponse>) {}

  async send(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push(request);
    return { status: 200, statusText: "OK", body: "", ...this.handler(request) };
  }

  get last(): TransportRequest {
    const request = this.requests[this.requests.length - 1];
    if (!request) throw new Error("no request was sent");
    return request;
  }
}

function requestFields(request: TransportRequest): Record<string, unknown> {
  const document: unknown = parser.parse(request.body);
  if (typeof document !== "object" || document === null || !("request" in document)) {
    throw new Error("no <request> element");
  }
  const fields: unknown = document.request;
  if (typeof fields !== "object" || fields === null) {
    throw new Error("<request> is empty");
  }
  return { ...fields };
}

function reply(body: string): () => Partial<TransportResponse> {
  return () => ({ body });
}

const EMPTY_INVOICES =
  '<?xml version="1.0" encoding="utf-8"?><response status="ok"><error></error><invoices page="1" per_page="25" total="0"/></response>';

const TWO_INVOICES = `<?xml version="1.0" encoding="utf-8"?>
<response status="ok">
  <error></error>
  <invoices page="1" total="2" per_page="25">
    <invoice><invoice_id>101</invoice_id><number>INV-101</number><amount>120.00</amount></invoice>
    <invoice><invoice_id>102</invoice_id><number>INV-102</number><amount>80.00</amount></invoice>
  </invoices>
</response>`;

describe("FreshBooksClient", () => {
  let transport: FakeTransport;
  let client: FreshBooksClient;

  beforeEach(() => {
    transport = new FakeTransport(reply(EMPTY_INVOICES));
    client = new FreshBooksClient({ account: ACCOUNT, credential: API_TOKEN, transport });
  });

  describe("constructor", () => {
    it("binds to the account's XML endpoint with a page size of 25", () => {
      expect(client.apiUrl).toBe(API_URL);
      expect(client.perPage).toBe(25);
    });

    it("accepts another service domain", () => {
      const staging = new FreshBooksClient({
        account: ACCOUNT,
        credential: API_TOKEN,
        domain: "staging.example.com",
      });
      expect(staging.apiUrl).toBe("https://acme.staging.example.com/api/2.1/xml-in");
    });

    it("requires an account", () => {
      expect(() => new FreshBooksClient({ account: "", credential: API_TOKEN })).toThrow(
        "account is required"
      );
    });

    it("rejects an account that is not a subdomain", () => {
      expect(
        () => new FreshBooksClient({ account: "acme.evil.com/", credential: API_TOKEN })
      ).toThrow(FreshBooksError);
    });

    it("rejects a non-positive page size", () => {
      expect(
        () => new FreshBooksClient({ account: ACCOUNT, credential: API_TOKEN, perPage: 0 })
      ).toThrow("perPage must be a positive integer");
    });
  });

  describe("listInvoices", () => {
    it("sends invoice.list with default pagination and no filters", async () => {
      await client.listInvoices();

      const sent = transport.last;
      expect(sent.method).toBe("POST");
      expect(sent.url).toBe(API_URL);
      expect(sent.body).toContain('method="invoice.list"');
      expect(sent.body).toContain("<per_page>25</per_page>");
      expect(sent.body).toContain("<page>1</page>");
      expect(requestFields(sent)).toEqual({
        "@_method": "invoice.list",
        per_page: "25",
        page: "1",
      });
    });

    it("returns the decoded invoices and pagination", async () => {
      transport = new FakeTransport(reply(TWO_INVOICES));
      client = new FreshBooksClient({ account: ACCOUNT, credential: API_TOKEN, transport });

      const result = await client.listInvoices();

      expect(result.items).toHaveLength(2);
      expect(result.items.map((invoice) => invoice.invoice_id)).toEqual([101, 102]);
      expect(result.items[1].number).toBe("INV-102");
      expect(result.pagination).toEqual({ page: 1, total: 2, per_page: 25 });
    });

    it("fails with the service's error text", async () => {
      transport = new FakeTransport(
        reply(
          '<?xml version="1.0" encoding="utf-8"?><response status="fail"><error>Invalid client ID</error></response>'
        )
      );
      client = new FreshBooksClient({ account: ACCOUNT, credential: API_TOKEN, transport });

      await expect(client.listInvoices({ client_id: "999" })).rejects.toMatchObject({
        code: FB_ERROR_CODES.SERVICE_ERROR,
        message: "Invalid client ID",
      });
    });

    it("fails when an error comes back next to a populated section", async () => {
      transport = new FakeTransport(
        reply(TWO_INVOICES.replace("<error></error>", "<error>Partial results</error>"))
      );
      client = new FreshBooksClient({ account: ACCOUNT, credential: API_TOKEN, transport });

      await expect(client.listInvoices()).rejects.toMatchObject({
        code: FB_ERROR_CODES.SERVICE_ERROR,
        message: "Partial results",
      });
    });

    it("passes filters through", async () => {
      await client.listInvoices({
        client_id: "42",
        date_from: new Date(Date.UTC(2024, 2, 1)),
        date_to: new Date(Date.UTC(2024, 2, 31)),
      });

      expect(requestFields(transport.last)).toEqual({
        "@_method": "invoice.list",
        per_page: "25",
        page: "1",
        date_from: "2024-03-01",
        date_to: "2024-03-31",
        client_id: "42",
      });
    });
  });

  describe("request defaults", () => {
    it("overwrites a caller-supplied method and fixes bad pagination", async () => {
      transport = new FakeTransport(
        reply('<response><error/><clients page="1" per_page="25" total="0"/></response>')
      );
      client = new FreshBooksClient({ account: ACCOUNT, credential: API_TOKEN, transport });

      await client.listClients({ method: "client.delete", page: 0, per_page: -1 });

      expect(requestFields(transport.last)).toEqual({
        "@_method": "client.list",
        per_page: "25",
        page: "1",
      });
    });

    it("uses the configured page size", async () => {
      client = new FreshBooksClient({
        account: ACCOUNT,
        credential: API_TOKEN,
        perPage: 100,
        transport,
      });

      await client.listInvoices({ page: 3 });

      const fields = requestFields(transport.last);
      expect(fields.per_page).toBe("100");
      expect(fields.page).toBe("3");
    });
  });

  describe("other list operations", () => {
    it("lists clients", async () => {
      transport = new FakeTransport(
        reply(
          '<response><error/><clients page="1" per_page="25" total="1"><client><client_id>7</client_id><organization>Globex</organization></client></clients></response>'
        )
      );
      client = new FreshBooksClient({ account: ACCOUNT, credential: API_TOKEN, transport });

      const result = await client.listClients();

      expect(result.items).toEqual([{ client_id: "7", organization: "Globex" }]);
      expect(result.pagination).toEqual({ page: 1, total: 1, per_page: 25 });
    });

    it("lists time entries for a project", async () => {
      transport = new FakeTransport(
        reply(
          '<response><error/><time_entries page="2" per_page="10" total="11"><time_entry><time_entry_id>5</time_entry_id><hours>1.5</hours></time_entry></time_entries></response>'
        )
      );
      client = new FreshBooksClient({ account: ACCOUNT, credential: API_TOKEN, transport });

      const result = await client.listTimeEntries({ project_id: "6", page: 2, per_page: 10 });

      expect(requestFields(transport.last)).toEqual({
        "@_method": "time_entry.list",
        per_page: "10",
        page: "2",
        project_id: "6",
      });
      expect(result.items[0]).toMatchObject({ time_entry_id: 5, hours: 1.5 });
      expect(result.pagination).toEqual({ page: 2, total: 11, per_page: 10 });
    });

    it("lists contractors", async () => {
      transport = new FakeTransport(
        reply(
          '<response><error/><contractors page="1" per_page="25" total="1"><contractor><contractor_id>9</contractor_id><name>Sam Rivera</name></contractor></contractors></response>'
        )
      );
      client = new FreshBooksClient({ account: ACCOUNT, credential: API_TOKEN, transport });

      const result = await client.listContractors();

      expect(requestFields(transport.last)["@_method"]).toBe("contractor.list");
      expect(result.items[0].name).toBe("Sam Rivera");
    });
  });

  describe("listAll", () => {
    it("walks every page", async () => {
      transport = new FakeTransport((request) => {
        const page = requestFields(request).page;
        const body =
          page === "1"
            ? '<response><error/><clients page="1" per_page="2" total="3"><client><client_id>1</client_id></client><client><client_id>2</client_id></client></clients></response>'
            : '<response><error/><clients page="2" per_page="2" total="3"><client><client_id>3</client_id></client></clients></response>';
        return { body };
      });
      client = new FreshBooksClient({ account: ACCOUNT, credential: API_TOKEN, transport, perPage: 2 });

      const clients = await client.listAll("clients");

      expect(clients.map((c) => c.client_id)).toEqual(["1", "2", "3"]);
      expect(transport.requests).toHaveLength(2);
    });

    it("stops on an empty page", async () => {
      const invoices = await client.listAll("invoices");

      expect(invoices).toEqual([]);
      expect(transport.requests).toHaveLength(1);
    });
  });

  describe("failures", () => {
    it("turns a non-2xx status into an HTTP error with the status line", async () => {
      transport = new FakeTransport(() => ({
        status: 503,
        statusText: "Service Unavailable",
        body: "down",
      }));
      client = new FreshBooksClient({ account: ACCOUNT, credential: API_TOKEN, transport });

      await expect(client.listInvoices()).rejects.toMatchObject({
        code: FB_ERROR_CODES.HTTP_ERROR,
        status: 503,
        message: "503 Service Unavailable",
      });
    });

    it("refuses to send an invalid date filter", async () => {
      await expect(
        client.listInvoices({ date_from: new Date("not a date") })
      ).rejects.toMatchObject({
        code: FB_ERROR_CODES.INVALID_REQUEST,
        message: "date_from is not a valid date",
      });
      expect(transport.requests).toHaveLength(0);
    });

    it("fails on an error element holding only whitespace", async () => {
      transport = new FakeTransport(reply("<response><error> </error></response>"));
      client = new FreshBooksClient({ account: ACCOUNT, credential: API_TOKEN, transport });

      await expect(client.listInvoices()).rejects.toMatchObject({
        code: FB_ERROR_CODES.SERVICE_ERROR,
        message: " ",
      });
    });

    it("reports malformed replies as decode errors", async () => {
      transport = new FakeTransport(reply("<response><error>"));
      client = new FreshBooksClient({ account: ACCOUNT, credential: API_TOKEN, transport });

      await expect(client.listInvoices()).rejects.toMatchObject({
        code: FB_ERROR_CODES.DECODE_ERROR,
      });
    });

    it("passes transport failures through unchanged", async () => {
      const failure = new FreshBooksError("connection reset", FB_ERROR_CODES.NETWORK_ERROR, 0);
      const failing: Transport = {
        async send() {
          throw failure;
        },
      };
      client = new FreshBooksClient({ account: ACCOUNT, credential: API_TOKEN, transport: failing });

      await expect(client.listInvoices()).rejects.toBe(failure);
    });
  });

  describe("authentication", () => {
    it("sends an API token as basic credentials", async () => {
      await client.listInvoices();

      expect(transport.last.headers.Authorization).toBe("Basic dGVzdC10b2tlbjpY");
    });

    it("sends the OAuth header from the token object on every request", async () => {
      let calls = 0;
      const oauth = {
        authHeader: () => {
          calls += 1;
          return `OAuth realm="",oauth_token="access-token",oauth_nonce="n${calls}"`;
        },
      };
      client = new FreshBooksClient({ account: ACCOUNT, credential: oauth, transport });

      await client.listInvoices();
      expect(transport.last.headers.Authorization).toBe(
        'OAuth realm="",oauth_token="access-token",oauth_nonce="n1"'
      );

      await client.listInvoices();
      expect(transport.last.headers.Authorization).toBe(
        'OAuth realm="",oauth_token="access-token",oauth_nonce="n2"'
      );
    });

    it("sends the request unauthenticated when the token is empty", async () => {
      client = new FreshBooksClient({ account: ACCOUNT, credential: "", transport });

      await client.listInvoices();

      expect(transport.last.headers).not.toHaveProperty("Authorization");
    });
  });

  describe("logging", () => {
    it("reports outgoing calls to the onLog hook", async () => {
      const entries: Array<[LogLevel, string]> = [];
      client = new FreshBooksClient({
        account: ACCOUNT,
        credential: API_TOKEN,
        transport,
        onLog: (level, message) => entries.push([level, message]),
      });

      await client.listInvoices();

      expect(entries).toEqual([
        ["debug", "POST invoice.list"],
        ["debug", "invoice.list returned 0 items"],
      ]);
    });
  });
});

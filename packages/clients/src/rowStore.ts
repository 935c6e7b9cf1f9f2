import { RowZ, type Row } from "@tally/shared";
import { z } from "zod";
import { normalizeBaseUrl } from "./embedder";
import type { HttpMethod, HttpResponse, HttpTransport } from "./transport";

export type EqualityFilter = {
  column: string;
  value: string;
};

export type CallOptions = {
  signal?: AbortSignal;
};

export type SelectOptions = CallOptions & {
  filters?: EqualityFilter[];
  order?: { column: string; ascending: boolean };
  limit?: number;
};

/**
 * Tabular primitives of a PostgREST-style backend.
 * `insert` only reports the generated id; callers re-read the row themselves.
 */
export interface RowStoreClient {
  select(table: string, options?: SelectOptions): Promise<Row[]>;
  insert(table: string, payload: Row, options?: CallOptions): Promise<string>;
  update(table: string, id: string, payload: Row, options?: CallOptions): Promise<void>;
  rpc(fn: string, body: Record<string, unknown>, options?: CallOptions): Promise<Row[]>;
}

export class RowStoreError extends Error {
  public readonly status?: number;
  public readonly body?: string;

  constructor(message: string, details: { status?: number; body?: string } = {}) {
    super(message);
    this.name = "RowStoreError";
    this.status = details.status;
    this.body = details.body;
  }
}

export type RestRowStoreConfig = {
  url: string;
  serviceKey: string;
  schema?: string;
  /** Use the root URL as the REST base instead of `<root>/rest/v1`. */
  plainBase?: boolean;
  transport: HttpTransport;
};

const RowsZ = z.array(RowZ);

function buildQuery(pairs: Array<[string, string]>): string {
  return pairs
    .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`)
    .join("&");
}

export function normalizeId(id: string): string {
  return id.replace(/^"+|"+$/g, "");
}

function parseRows(body: string, message: string): Row[] {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    throw new RowStoreError(message, { body });
  }
  const rows = RowsZ.safeParse(data);
  if (!rows.success) {
    throw new RowStoreError(message, { body });
  }
  return rows.data;
}

export class RestRowStoreClient implements RowStoreClient {
  private readonly restBase: string;
  private readonly rpcBase: string;
  private readonly serviceKey: string;
  private readonly schema: string;
  private readonly transport: HttpTransport;

  constructor(config: RestRowStoreConfig) {
    const root = normalizeBaseUrl(config.url);
    this.restBase = config.plainBase ? root : `${root}/rest/v1`;
    this.rpcBase = `${this.restBase}/rpc`;
    this.serviceKey = config.serviceKey;
    this.schema = config.schema ?? "public";
    this.transport = config.transport;
  }

  get baseUrl(): string {
    return this.restBase;
  }

  async select(table: string, options: SelectOptions = {}): Promise<Row[]> {
    const pairs: Array<[string, string]> = [["select", "*"]];
    for (const filter of options.filters ?? []) {
      pairs.push([filter.column, `eq.${filter.value}`]);
    }
    if (options.order) {
      pairs.push(["order", `${options.order.column}.${options.order.ascending ? "asc" : "desc"}`]);
    }
    if (options.limit !== undefined) {
      pairs.push(["limit", String(options.limit)]);
    }

    const response = await this.send(
      `query ${table}`,
      "GET",
      `${this.restBase}/${table}?${buildQuery(pairs)}`,
      { signal: options.signal }
    );
    return parseRows(response.body, `failed to parse ${table} response`);
  }

  async insert(table: string, payload: Row, options: CallOptions = {}): Promise<string> {
    const response = await this.send(
      `insert into ${table}`,
      "POST",
      `${this.restBase}/${table}?${buildQuery([["select", "id"]])}`,
      { body: payload, prefer: "return=representation", signal: options.signal }
    );

    const rows = parseRows(response.body, `failed to parse ${table} response`);
    const id = rows[0]?.id;
    if (typeof id === "string" && id.length > 0) return normalizeId(id);
    if (typeof id === "number") return String(id);
    throw new RowStoreError(`insert into ${table} returned no id`, { body: response.body });
  }

  async update(table: string, id: string, payload: Row, options: CallOptions = {}): Promise<void> {
    await this.send(
      `update ${table}`,
      "PATCH",
      `${this.restBase}/${table}?${buildQuery([["id", `eq.${id}`]])}`,
      { body: payload, prefer: "return=minimal", signal: options.signal }
    );
  }

  async rpc(fn: string, body: Record<string, unknown>, options: CallOptions = {}): Promise<Row[]> {
    const response = await this.send(`RPC ${fn}`, "POST", `${this.rpcBase}/${fn}`, {
      body,
      signal: options.signal,
    });
    return parseRows(response.body, "failed to parse RPC response");
  }

  private headers(prefer?: string): Record<string, string> {
    return {
      apikey: this.serviceKey,
      Authorization: `Bearer ${this.serviceKey}`,
      "Content-Type": "application/json",
      Accept: "application/json",
      "Accept-Profile": this.schema,
      "Content-Profile": this.schema,
      ...(prefer ? { Prefer: prefer } : {}),
    };
  }

  private async send(
    label: string,
    method: HttpMethod,
    url: string,
    options: { body?: unknown; prefer?: string; signal?: AbortSignal }
  ): Promise<HttpResponse> {
    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method,
        url,
        headers: this.headers(options.prefer),
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: options.signal,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new RowStoreError(`${label} request failed: ${message}`);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new RowStoreError(`${label} failed (${response.status}): ${response.body}`, {
        status: response.status,
        body: response.body,
      });
    }
    return response;
  }
}

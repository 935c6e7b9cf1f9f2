import http from "node:http";
import https from "node:https";
import { Agent, request as undiciRequest } from "undici";
import type { Logger, TlsBackend, TlsMinVersion } from "@tally/shared";

export type HttpMethod = "GET" | "POST" | "PATCH";

export type HttpRequest = {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
};

export type HttpResponse = {
  status: number;
  body: string;
};

/**
 * Minimal HTTP seam used by the row store client. Long-lived and shared by
 * every tool call; implementations hold no per-request state.
 */
export interface HttpTransport {
  readonly backend: string;
  send(request: HttpRequest): Promise<HttpResponse>;
  close(): Promise<void>;
}

export type TlsOptions = {
  minVersion: TlsMinVersion;
  acceptInvalidCerts: boolean;
};

export type TransportOptions = TlsOptions & {
  backend: TlsBackend;
  logger?: Logger;
};

export function createUndiciTransport(tls: TlsOptions): HttpTransport {
  const agent = new Agent({
    connect: {
      rejectUnauthorized: !tls.acceptInvalidCerts,
      minVersion: tls.minVersion,
    },
  });

  return {
    backend: "undici",
    async send(request) {
      const response = await undiciRequest(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: request.signal,
        dispatcher: agent,
      });
      return { status: response.statusCode, body: await response.body.text() };
    },
    close: () => agent.close(),
  };
}

export function createNodeTransport(tls: TlsOptions): HttpTransport {
  const httpsAgent = new https.Agent({
    keepAlive: true,
    rejectUnauthorized: !tls.acceptInvalidCerts,
    minVersion: tls.minVersion,
  });
  const httpAgent = new http.Agent({ keepAlive: true });

  const send = (request: HttpRequest): Promise<HttpResponse> =>
    new Promise((resolve, reject) => {
      const url = new URL(request.url);
      const headers: Record<string, string> = { ...request.headers };
      if (request.body !== undefined) {
        headers["Content-Length"] = String(Buffer.byteLength(request.body));
      }

      const onResponse = (res: http.IncomingMessage) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("error", reject);
        res.on("end", () => {
          resolve({ status: res.statusCode ?? 0, body: Buffer.concat(chunks).toString("utf8") });
        });
      };

      const outgoing =
        url.protocol === "http:"
          ? http.request(
              url,
              { method: request.method, headers, signal: request.signal, agent: httpAgent },
              onResponse
            )
          : https.request(
              url,
              { method: request.method, headers, signal: request.signal, agent: httpsAgent },
              onResponse
            );

      outgoing.on("error", reject);
      if (request.body !== undefined) {
        outgoing.write(request.body);
      }
      outgoing.end();
    });

  return {
    backend: "node",
    send,
    async close() {
      httpsAgent.destroy();
      httpAgent.destroy();
    },
  };
}

export function createTransport(options: TransportOptions): HttpTransport {
  if (options.acceptInvalidCerts) {
    options.logger?.warn("tls.verification_disabled", {
      backend: options.backend,
      note: "TLS certificate verification disabled - FOR TESTING ONLY",
    });
  }

  const tls = { minVersion: options.minVersion, acceptInvalidCerts: options.acceptInvalidCerts };
  const transport =
    options.backend === "node" ? createNodeTransport(tls) : createUndiciTransport(tls);

  options.logger?.info("transport.created", {
    backend: transport.backend,
    tls_min_version: options.minVersion,
  });
  return transport;
}

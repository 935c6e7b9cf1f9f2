import { describe, expect, it } from "vitest";
import {
  ConfigError,
  DEFAULT_EMBEDDER_BASE_URL,
  DEFAULT_EMBEDDING_MODEL,
  describeDatabaseUrl,
  loadConfig,
} from "../src/config";

const required = {
  DATABASE_URL: "https://db.example.test",
  DATABASE_SERVICE_KEY: "test-secret",
  EMBEDDER_API_KEY: "test-embedder-key",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(required);

    expect(config).toEqual({
      database: {
        url: "https://db.example.test",
        serviceKey: "test-secret",
        schema: "public",
        plainBase: false,
      },
      embedder: {
        apiKey: "test-embedder-key",
        baseUrl: DEFAULT_EMBEDDER_BASE_URL,
        model: DEFAULT_EMBEDDING_MODEL,
        dims: undefined,
        useFake: false,
      },
      tls: { backend: "undici", minVersion: "TLSv1.2", acceptInvalidCerts: false },
      logLevel: "info",
      maxConcurrentTools: undefined,
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.database)).toBe(true);
  });

  it("reads every override", () => {
    const config = loadConfig({
      ...required,
      DATABASE_SCHEMA: "ledger",
      DATABASE_PLAIN_BASE: "true",
      EMBEDDER_BASE_URL: "http://localhost:8080/v1",
      EMBEDDING_MODEL: "text-embedding-3-small",
      EMBEDDING_DIMS: "1536",
      LOG_LEVEL: "DEBUG",
      TLS_BACKEND: "node",
      TLS_MIN_VERSION: "1.3",
      DANGER_ACCEPT_INVALID_CERTS: "1",
      MAX_CONCURRENT_TOOLS: "4",
    });

    expect(config.database.schema).toBe("ledger");
    expect(config.database.plainBase).toBe(true);
    expect(config.embedder).toMatchObject({
      baseUrl: "http://localhost:8080/v1",
      model: "text-embedding-3-small",
      dims: 1536,
    });
    expect(config.logLevel).toBe("debug");
    expect(config.tls).toEqual({ backend: "node", minVersion: "TLSv1.3", acceptInvalidCerts: true });
    expect(config.maxConcurrentTools).toBe(4);
  });

  it("names every missing variable", () => {
    const error = (() => {
      try {
        loadConfig({ DATABASE_URL: "" });
      } catch (err) {
        return err;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      message: "Missing required env vars: DATABASE_URL, DATABASE_SERVICE_KEY, EMBEDDER_API_KEY",
      missing: ["DATABASE_URL", "DATABASE_SERVICE_KEY", "EMBEDDER_API_KEY"],
    });
  });

  it("does not need an embedder key for the fake embedder", () => {
    const config = loadConfig({
      DATABASE_URL: "https://db.example.test",
      DATABASE_SERVICE_KEY: "test-secret",
      EMBEDDER_USE_FAKE: "true",
    });

    expect(config.embedder.useFake).toBe(true);
    expect(config.embedder.apiKey).toBeUndefined();
  });

  it("does not need a service key for the in-memory store", () => {
    const config = loadConfig({ DATABASE_URL: "memory://", EMBEDDER_USE_FAKE: "1" });
    expect(config.database.serviceKey).toBe("");
  });

  it("rejects malformed values", () => {
    expect(() => loadConfig({ ...required, TLS_BACKEND: "openssl" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...required, TLS_MIN_VERSION: "1.1" })).toThrow(
      "Invalid configuration: TLS_MIN_VERSION must be 1.2 or 1.3"
    );
    expect(() => loadConfig({ ...required, MAX_CONCURRENT_TOOLS: "0" })).toThrow(
      "MAX_CONCURRENT_TOOLS must be a positive integer"
    );
  });
});

describe("describeDatabaseUrl", () => {
  it("keeps only the host", () => {
    expect(describeDatabaseUrl("https://user:pw@db.example.test:5433/rest")).toBe("db.example.test:5433");
    expect(describeDatabaseUrl("not a url")).toBe("<invalid url>");
  });
});

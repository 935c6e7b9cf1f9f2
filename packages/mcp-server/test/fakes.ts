import { BaseEmbedder, MemoryRowStoreClient, type EmbedOptions, type Vector } from "@tally/clients";
import { RestStore } from "@tally/core";
import { createLogger, type Logger } from "@tally/shared";

/** Records every text it is asked to embed; the vector is `[text.length, 1]`. */
export class RecordingEmbedder extends BaseEmbedder {
  readonly calls: string[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];
  failWith: Error | null = null;

  async embed(text: string, options?: EmbedOptions): Promise<Vector> {
    this.calls.push(text);
    this.signals.push(options?.signal);
    if (this.failWith) throw this.failWith;
    return [text.length, 1];
  }
}

/** Holds every embed call open until the test releases it. */
export class GatedEmbedder extends BaseEmbedder {
  readonly calls: string[] = [];
  private readonly gates: Array<() => void> = [];

  async embed(text: string): Promise<Vector> {
    this.calls.push(text);
    await new Promise<void>((resolve) => this.gates.push(resolve));
    return [1, 0];
  }

  openNext(): void {
    this.gates.shift()?.();
  }
}

export function sequentialIds(prefix = "row") {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

export function memoryStore(client = new MemoryRowStoreClient({ generateId: sequentialIds() })) {
  return { client, store: new RestStore(client) };
}

export function captureLogger(level: "debug" | "info" = "info"): {
  entries: Array<Record<string, unknown>>;
  logger: Logger;
} {
  const entries: Array<Record<string, unknown>> = [];
  const logger = createLogger({}, { level, sink: (line) => entries.push(JSON.parse(line)) });
  return { entries, logger };
}

export function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

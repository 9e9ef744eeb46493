import { log } from "@/logger";
import {
  GammaHttpError,
  GammaNotFoundError,
  GammaRequestError,
  GammaResponseError,
} from "@/gamma/errors";
import { gammaEventListSchema, type EventQuery, type EventSource, type GammaEvent } from "@/gamma/schema";

export type GammaClientOptions = {
  baseUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
};

function buildUrl(baseUrl: string, path: string, query: EventQuery): URL {
  const url = new URL(path, baseUrl);
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    url.searchParams.set(key, String(value));
  }
  return url;
}

export class GammaClient implements EventSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GammaClientOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? globalThis.fetch.bind(globalThis);
  }

  async listEvents(query: EventQuery): Promise<GammaEvent[]> {
    const url = buildUrl(this.baseUrl, "/events", query);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    log.debug({ url: url.toString() }, "GET events");

    try {
      let res: Response;
      try {
        res = await this.fetchImpl(url, {
          method: "GET",
          headers: { Accept: "application/json" },
          signal: controller.signal,
        });
      } catch (error) {
        const reason = controller.signal.aborted
          ? `timed out after ${this.timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : "request_failed";
        throw new GammaRequestError(`GET ${url.pathname} failed: ${reason}`, { cause: error });
      }

      if (res.status === 404) throw new GammaNotFoundError(url.toString());
      if (!res.ok) throw new GammaHttpError(res.status, url.toString());

      let body: unknown;
      try {
        body = await res.json();
      } catch (error) {
        throw new GammaResponseError(`GET ${url.pathname} returned invalid JSON`, { cause: error });
      }

      const parsed = gammaEventListSchema.safeParse(Array.isArray(body) ? body : [body]);
      if (!parsed.success) {
        throw new GammaResponseError(
          `GET ${url.pathname} returned unexpected data: ${parsed.error.issues[0]?.message ?? "schema mismatch"}`,
          { cause: parsed.error },
        );
      }
      log.debug({ url: url.toString(), count: parsed.data.length }, "events received");
      return parsed.data;
    } finally {
      clearTimeout(timeout);
    }
  }
}

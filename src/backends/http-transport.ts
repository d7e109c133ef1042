import { fromString as uint8ArrayFromString } from "uint8arrays/from-string";
import { toString as uint8ArrayToString } from "uint8arrays/to-string";
import type { HsConfig } from "../config.js";
import type { ArrayInfo, ChunkLayout, Dataspace, MaxShape, Shape } from "../types.js";
import type { TypeItem } from "../core/type-codec.js";
import { PayloadTooLargeError, TransportError } from "../errors.js";
import { Semaphore } from "../utils/semaphore.js";
import type { Transport, ValueRequest, ValueResponse } from "./transport.js";

export interface HttpTransportOptions {
  endpoint: string;
  domain?: string | null;
  bucket?: string | null;
  concurrency?: number;
  headers?: Record<string, string>;
  auth?: { username: string; password: string } | null;
  apiKey?: string | null;
  maxRetries?: number;
  initialDelay?: number; // seconds
  backoffFactor?: number; // >= 1.0
}

// dataset metadata as returned by GET /datasets/{id}
interface DatasetResponse {
  id: string;
  shape: {
    class: "H5S_NULL" | "H5S_SCALAR" | "H5S_SIMPLE";
    dims?: number[];
    maxdims?: number[];
  };
  type: TypeItem;
  layout?: { class: string; dims?: number[] };
}

const OCTET_STREAM = "application/octet-stream";

function isRetryable(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === "TimeoutError") return true;
  if ("code" in err && (err.code === "ECONNRESET" || err.code === "ECONNREFUSED")) return true;
  return /timeout|network|fetch failed/i.test(err.message);
}

function parseDataspace(shape: DatasetResponse["shape"]): { shape: Dataspace; maxshape: MaxShape | null } {
  switch (shape.class) {
    case "H5S_NULL":
      return { shape: null, maxshape: null };
    case "H5S_SCALAR":
      return { shape: [], maxshape: null };
    default: {
      const dims = shape.dims ?? [];
      // 0 in maxdims is H5S_UNLIMITED
      const maxshape = shape.maxdims ? shape.maxdims.map((n) => (n === 0 ? null : n)) : null;
      return { shape: dims, maxshape };
    }
  }
}

/**
 * REST transport for a remote array service
 */
export class HttpTransport implements Transport {
  static readonly DEFAULT_ENDPOINT = "http://127.0.0.1:5101";

  private readonly endpoint: string;
  private readonly params: Record<string, string>;
  private readonly sem: Semaphore;
  private readonly headers?: Record<string, string>;
  private readonly authHeader?: string;
  private readonly maxRetries: number;
  private readonly initialDelay: number;
  private readonly backoffFactor: number;
  private closed = false;

  constructor(opts: HttpTransportOptions) {
    const {
      endpoint,
      domain = null,
      bucket = null,
      concurrency = 16,
      headers,
      auth = null,
      apiKey = null,
      maxRetries = 3,
      initialDelay = 1.0,
      backoffFactor = 2.0,
    } = opts;

    if (maxRetries < 0) throw new Error("maxRetries must be non-negative");
    if (initialDelay <= 0) throw new Error("initialDelay must be positive");
    if (backoffFactor < 1.0) throw new Error("backoffFactor must be >= 1.0");

    this.endpoint = (endpoint || HttpTransport.DEFAULT_ENDPOINT).replace(/\/+$/, "");
    this.params = {};
    if (domain) this.params.domain = domain;
    if (bucket) this.params.bucket = bucket;

    this.sem = new Semaphore(concurrency);
    this.headers = headers;
    if (apiKey) {
      this.authHeader = `Bearer ${apiKey}`;
    } else if (auth) {
      const credentials = `${auth.username}:${auth.password}`;
      this.authHeader = "Basic " + uint8ArrayToString(uint8ArrayFromString(credentials), "base64pad");
    }
    this.maxRetries = maxRetries;
    this.initialDelay = initialDelay;
    this.backoffFactor = backoffFactor;
  }

  /**
   * Build a transport from loaded configuration
   */
  static fromConfig(
    config: HsConfig,
    opts: Omit<HttpTransportOptions, "endpoint" | "auth" | "apiKey" | "bucket"> = {}
  ): HttpTransport {
    const auth = config.hs_username
      ? { username: config.hs_username, password: config.hs_password }
      : null;
    return new HttpTransport({
      ...opts,
      endpoint: config.hs_endpoint,
      auth,
      apiKey: config.hs_api_key || null,
      bucket: config.hs_bucket || null,
    });
  }

  // ------------------------------- utilities --------------------------------
  private buildHeaders(extra?: Record<string, string>): Headers {
    const h = new Headers(this.headers ?? {});
    if (this.authHeader) h.set("Authorization", this.authHeader);
    if (extra) for (const [k, v] of Object.entries(extra)) h.set(k, v);
    return h;
  }

  private url(path: string, params: Record<string, string> = {}): string {
    const query = new URLSearchParams({ ...params, ...this.params }).toString();
    return query ? `${this.endpoint}${path}?${query}` : `${this.endpoint}${path}`;
  }

  private async retrying<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let attempt = 0;
    while (attempt <= this.maxRetries) {
      try {
        return await fn();
      } catch (err: unknown) {
        attempt++;
        if (signal?.aborted || !isRetryable(err) || attempt > this.maxRetries) {
          throw err;
        }
        const delay = this.initialDelay * Math.pow(this.backoffFactor, attempt - 1);
        const jitter = delay * 0.1 * (Math.random() - 0.5);
        console.warn(`request failed (attempt ${attempt} of ${this.maxRetries + 1}), retrying:`, err);
        await new Promise((r) => setTimeout(r, (delay + jitter) * 1000));
      }
    }
    throw new Error("Exited the retry loop unexpectedly.");
  }

  private async send(
    method: string,
    path: string,
    init: { params?: Record<string, string>; headers?: Record<string, string>; body?: Blob | string; signal?: AbortSignal }
  ): Promise<Response> {
    if (this.closed) {
      throw new TransportError("Transport has been closed");
    }
    const url = this.url(path, init.params);
    return this.sem.withPermit(async () =>
      this.retrying(async () => {
        const res = await fetch(url, {
          method,
          headers: this.buildHeaders(init.headers),
          body: init.body,
          signal: init.signal,
        });
        if (res.status === 413) {
          throw new PayloadTooLargeError(`${method} ${path}: request too large`);
        }
        if (!res.ok) {
          const text = await res.text().catch(() => "");
          throw new TransportError(
            `${method} ${path} failed: ${res.status} ${res.statusText} ${text}`.trim(),
            res.status
          );
        }
        return res;
      }, init.signal)
    );
  }

  private async valueResponse(res: Response): Promise<ValueResponse> {
    const contentType = res.headers.get("Content-Type") ?? "";
    if (contentType.startsWith(OCTET_STREAM)) {
      return { kind: "binary", bytes: new Uint8Array(await res.arrayBuffer()) };
    }
    const json: { value?: unknown } = await res.json();
    return { kind: "json", value: json.value };
  }

  // ------------------------------- Transport --------------------------------
  async getArrayInfo(id: string, signal?: AbortSignal): Promise<ArrayInfo> {
    const res = await this.send("GET", `/datasets/${id}`, { signal });
    const json: DatasetResponse = await res.json();
    const { shape, maxshape } = parseDataspace(json.shape);
    let chunks: ChunkLayout | null = null;
    if (json.layout?.class === "H5D_CHUNKED" && json.layout.dims) {
      chunks = json.layout.dims;
    }
    return { id: json.id, shape, maxshape, type: json.type, chunks };
  }

  async getValue(request: ValueRequest): Promise<ValueResponse> {
    const params: Record<string, string> = {};
    if (request.select !== undefined) params.select = request.select;
    const res = await this.send("GET", `/datasets/${request.id}/value`, {
      params,
      headers: { Accept: OCTET_STREAM },
      signal: request.signal,
    });
    return this.valueResponse(res);
  }

  async postValue(request: ValueRequest): Promise<ValueResponse> {
    const body: { select?: string; points?: ValueRequest["points"] } = {};
    if (request.points !== undefined) body.points = request.points;
    else if (request.select !== undefined) body.select = request.select;
    const res = await this.send("POST", `/datasets/${request.id}/value`, {
      headers: { Accept: OCTET_STREAM, "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal: request.signal,
    });
    return this.valueResponse(res);
  }

  async putValue(request: ValueRequest): Promise<void> {
    const data = request.body ?? new Uint8Array(0);
    if (request.points !== undefined) {
      await this.send("PUT", `/datasets/${request.id}/value`, {
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          points: request.points,
          value_base64: uint8ArrayToString(data, "base64pad"),
        }),
        signal: request.signal,
      });
      return;
    }
    const params: Record<string, string> = {};
    if (request.select !== undefined) params.select = request.select;
    await this.send("PUT", `/datasets/${request.id}/value`, {
      params,
      headers: { "Content-Type": OCTET_STREAM },
      body: new Blob([data]),
      signal: request.signal,
    });
  }

  async resize(id: string, shape: Shape, signal?: AbortSignal): Promise<void> {
    await this.send("PUT", `/datasets/${id}/shape`, {
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ shape }),
      signal,
    });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

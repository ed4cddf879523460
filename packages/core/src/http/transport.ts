import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from "axios";
import type { Logger } from "pino";
import type { Credentials, Settings } from "../config/config.js";
import { ApiError, AuthError, TransportError, errorMessage } from "../errors.js";
import { createTransportLogger } from "../observability/logger.js";
import { VERSION } from "../version.js";

export type HttpMethod = "GET" | "POST" | "PATCH" | "PUT" | "DELETE";

export type QueryValue = string | number | boolean;
export type QueryParams = Record<string, QueryValue | readonly QueryValue[] | undefined>;

export const ACCEPT_JSON = "application/json";
export const ACCEPT_CONTENT = "application/mbox, text/plain";

export interface RequestOptions {
  query?: QueryParams;
  body?: unknown;
  accept?: string;
}

export interface TransportResponse {
  status: number;
  /** Lower-cased header names. */
  headers: Record<string, string>;
  body: Buffer;
  url: string;
}

export interface TransportOptions {
  settings: Pick<Settings, "server" | "credentials" | "timeoutMs">;
  /** Replaces axios' network adapter; tests use it to simulate failures. */
  adapter?: AxiosAdapter;
  logger?: Logger;
}

export function authorizationHeader(credentials: Credentials | null): string | undefined {
  if (!credentials) return undefined;
  if (credentials.kind === "token") return `Token ${credentials.token}`;
  const encoded = Buffer.from(`${credentials.username}:${credentials.password}`).toString("base64");
  return `Basic ${encoded}`;
}

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

/**
 * One HTTP exchange per call against the configured API root.
 * Never retries; every call carries the configured timeout.
 */
export class Transport {
  private readonly client: AxiosInstance;
  private readonly server: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(opts: TransportOptions) {
    this.server = opts.settings.server.replace(/\/+$/, "");
    this.timeoutMs = opts.settings.timeoutMs;
    this.log = opts.logger ?? createTransportLogger();

    const authorization = authorizationHeader(opts.settings.credentials);
    this.client = axios.create({
      timeout: this.timeoutMs,
      responseType: "arraybuffer",
      // Status mapping happens in request(); axios must hand every response back.
      validateStatus: () => true,
      headers: {
        "User-Agent": `patchpull (${VERSION})`,
        ...(authorization ? { Authorization: authorization } : {}),
      },
      ...(opts.adapter ? { adapter: opts.adapter } : {}),
    });
  }

  /** Absolute URLs (pagination links, content references) pass through untouched. */
  resolve(path: string, query?: QueryParams): string {
    const url = new URL(/^https?:\/\//i.test(path) ? path : `${this.server}/${path.replace(/^\/+/, "")}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value === undefined) continue;
      const values: readonly QueryValue[] = typeof value === "object" ? value : [value];
      for (const v of values) url.searchParams.append(key, String(v));
    }
    return url.toString();
  }

  async request(method: HttpMethod, path: string, opts: RequestOptions = {}): Promise<TransportResponse> {
    const url = this.resolve(path, opts.query);
    const started = Date.now();

    let res: AxiosResponse<unknown>;
    try {
      res = await this.client.request<unknown>({
        method,
        url,
        data: opts.body,
        headers: { Accept: opts.accept ?? ACCEPT_JSON },
      });
    } catch (err) {
      this.log.debug({ method, url, err }, "request failed");
      throw this.wrapNetworkError(err, url);
    }

    const response: TransportResponse = {
      status: res.status,
      headers: flattenHeaders(res.headers),
      body: toBuffer(res.data),
      url,
    };
    this.log.debug({ method, url, status: res.status, ms: Date.now() - started }, "response");

    if (response.status < 400) return response;
    throw errorForResponse(response);
  }

  private wrapNetworkError(err: unknown, url: string): TransportError {
    if (axios.isAxiosError(err)) {
      if (err.code && TIMEOUT_CODES.has(err.code)) {
        return TransportError.timeout(url, this.timeoutMs, err);
      }
      return new TransportError(`Request to ${url} failed: ${err.message}`, { cause: err });
    }
    return new TransportError(`Request to ${url} failed: ${errorMessage(err)}`, { cause: err });
  }
}

/** Parse a JSON body; a body that is not JSON is a transport failure. */
export function decodeJson(response: TransportResponse): unknown {
  try {
    return JSON.parse(response.body.toString("utf8"));
  } catch (err) {
    throw TransportError.unparseable(response.url, err);
  }
}

function errorForResponse(response: TransportResponse): Error {
  const { status, url } = response;
  const payload = tryJson(response.body);
  const detail = payload === undefined ? undefined : describePayload(payload);

  if (status === 401 || status === 403) {
    return new AuthError(
      detail ? `Authentication failed (${status}): ${detail}` : `Authentication failed (${status})`,
      { status, details: payload },
    );
  }
  if (payload !== undefined && typeof payload === "object" && payload !== null) {
    return new ApiError(`Server returned ${status}: ${detail}`, { status, details: payload });
  }
  return new TransportError(`Unexpected ${status} response from ${url}`, { status });
}

function tryJson(body: Buffer): unknown {
  if (body.length === 0) return undefined;
  try {
    return JSON.parse(body.toString("utf8"));
  } catch {
    return undefined;
  }
}

function describePayload(payload: unknown): string {
  if (typeof payload === "object" && payload !== null && "detail" in payload) {
    const { detail } = payload;
    if (typeof detail === "string") return detail;
  }
  return JSON.stringify(payload);
}

function flattenHeaders(headers: object): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || value === null || typeof value === "function") continue;
    out[key.toLowerCase()] = Array.isArray(value) ? value.join(", ") : String(value);
  }
  return out;
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(new Uint8Array(data));
  if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (typeof data === "string") return Buffer.from(data, "utf8");
  if (data === undefined || data === null) return Buffer.alloc(0);
  return Buffer.from(JSON.stringify(data), "utf8");
}

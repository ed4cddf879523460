import { describe, it, expect } from "vitest";
import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from "axios";
import { loadSettings } from "../config/config.js";
import { ApiError, AuthError, TransportError } from "../errors.js";
import { ResourceClient } from "../resources/client.js";
import { Transport, authorizationHeader, type TransportOptions } from "./transport.js";

const API = "https://pw.test/api/1.1";

interface Reply {
  status: number;
  body?: string;
  headers?: Record<string, string>;
}

function stubAdapter(reply: Reply, seen: InternalAxiosRequestConfig[] = []): AxiosAdapter {
  return async (config) => {
    seen.push(config);
    return {
      data: Buffer.from(reply.body ?? ""),
      status: reply.status,
      statusText: "",
      headers: reply.headers ?? {},
      config,
    };
  };
}

function failingAdapter(code: string, message: string): AxiosAdapter {
  return async (config) => {
    throw new AxiosError(message, code, config);
  };
}

function transport(adapter: AxiosAdapter, settings: Partial<TransportOptions["settings"]> = {}) {
  return new Transport({
    settings: { server: API, credentials: null, timeoutMs: 50, ...settings },
    adapter,
  });
}

describe("Transport", () => {
  it("resolves relative paths against the API root and repeats multi-valued params", async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const t = transport(stubAdapter({ status: 200, body: "[]" }, seen));
    await t.request("GET", "patches/", { query: { state: ["new", "under-review"], project: "demo", q: undefined } });
    expect(seen[0].url).toBe(`${API}/patches/?state=new&state=under-review&project=demo`);
    expect(seen[0].method).toBe("get");
  });

  it("passes absolute URLs through untouched", async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const t = transport(stubAdapter({ status: 200, body: "[]" }, seen));
    await t.request("GET", `${API}/patches/?page=2&per_page=5`);
    expect(seen[0].url).toBe(`${API}/patches/?page=2&per_page=5`);
  });

  it("sends accept, user agent and token headers", async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const t = transport(stubAdapter({ status: 200, body: "x" }, seen), {
      credentials: { kind: "token", token: "test-token" },
    });
    await t.request("GET", "patches/1/", { accept: "text/plain" });
    expect(seen[0].headers.get("Authorization")).toBe("Token test-token");
    expect(seen[0].headers.get("Accept")).toBe("text/plain");
    expect(seen[0].headers.get("User-Agent")).toBe("patchpull (0.1.0)");
    expect(seen[0].timeout).toBe(50);
  });

  it("sends no Authorization header without credentials", async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    await transport(stubAdapter({ status: 200 }, seen)).request("GET", "projects/");
    expect(seen[0].headers.get("Authorization")).toBeUndefined();
  });

  it("returns status, lower-cased headers and the raw body", async () => {
    const t = transport(
      stubAdapter({ status: 200, body: "From: x", headers: { "Content-Disposition": "attachment; filename=a.patch" } }),
    );
    const res = await t.request("GET", "patches/1/mbox/");
    expect(res.status).toBe(200);
    expect(res.headers["content-disposition"]).toBe("attachment; filename=a.patch");
    expect(res.body.toString("utf8")).toBe("From: x");
  });

  it("maps 401 to AuthError with the server detail", async () => {
    const t = transport(stubAdapter({ status: 401, body: JSON.stringify({ detail: "Invalid token." }) }));
    const err = await t.request("GET", "patches/").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AuthError);
    expect(err).toMatchObject({ status: 401, message: "Authentication failed (401): Invalid token." });
  });

  it("maps 403 without a body to AuthError", async () => {
    const t = transport(stubAdapter({ status: 403 }));
    await expect(t.request("PATCH", "patches/1/")).rejects.toThrow("Authentication failed (403)");
  });

  it("maps other JSON error bodies to ApiError", async () => {
    const t = transport(stubAdapter({ status: 400, body: JSON.stringify({ state: ["bad"] }) }));
    const err = await t.request("GET", "patches/").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({ status: 400, message: 'Server returned 400: {"state":["bad"]}' });
  });

  it("maps undecodable error bodies to TransportError", async () => {
    const t = transport(stubAdapter({ status: 502, body: "<html>bad gateway</html>" }));
    const err = await t.request("GET", "patches/").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ status: 502, message: `Unexpected 502 response from ${API}/patches/` });
  });

  it("flags timeouts", async () => {
    const t = transport(failingAdapter("ECONNABORTED", "timeout of 50ms exceeded"));
    const err = await t.request("GET", "patches/").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ timedOut: true, message: `Request to ${API}/patches/ timed out after 50ms` });
  });

  it("wraps connection failures without retrying", async () => {
    let calls = 0;
    const adapter: AxiosAdapter = async (config) => {
      calls += 1;
      throw new AxiosError("connect ECONNREFUSED 127.0.0.1:443", "ECONNREFUSED", config);
    };
    const err = await transport(adapter).request("GET", "patches/").catch((e: unknown) => e);
    expect(err).toMatchObject({
      timedOut: false,
      message: `Request to ${API}/patches/ failed: connect ECONNREFUSED 127.0.0.1:443`,
    });
    expect(calls).toBe(1);
  });

  it("rejects a success body that is not JSON", async () => {
    const settings = loadSettings({ overrides: { server: API, project: "demo" } });
    const t = new Transport({ settings, adapter: stubAdapter({ status: 200, body: "not json" }) });
    const client = new ResourceClient({ transport: t, settings });
    await expect(client.get("patches", "1")).rejects.toThrow(`Unparseable response from ${API}/patches/1/`);
  });
});

describe("authorizationHeader", () => {
  it("encodes basic credentials", () => {
    expect(authorizationHeader({ kind: "basic", username: "maintainer", password: "test-password" })).toBe(
      `Basic ${Buffer.from("maintainer:test-password").toString("base64")}`,
    );
  });

  it("uses the token scheme for tokens", () => {
    expect(authorizationHeader({ kind: "token", token: "test-token" })).toBe("Token test-token");
    expect(authorizationHeader(null)).toBeUndefined();
  });
});

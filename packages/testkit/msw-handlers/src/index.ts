import { http, HttpResponse, type HttpHandler } from "msw";
import type { RouteDescriptor, ScenarioResult } from "@patchpull/testkit-scenarios";
import { errorEnvelope } from "@patchpull/testkit-utils";

interface CompiledRoute {
  route: RouteDescriptor;
  regex: RegExp;
  names: string[];
}

function compile(route: RouteDescriptor): CompiledRoute {
  // very small path param matcher, e.g. /api/1.1/patches/:patchId/
  const names: string[] = [];
  const re = route.path.replace(/:([^/]+)/g, (_m, name: string) => {
    names.push(name);
    return "([^/]+)";
  });
  return { route, regex: new RegExp("^" + re + "$"), names };
}

function headersToObject(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((v, k) => {
    out[k] = v;
  });
  return out;
}

async function readBody(request: Request): Promise<unknown> {
  if (request.method === "GET" || request.method === "HEAD") return undefined;
  const text = await request.text();
  if (!text) return undefined;
  const ct = request.headers.get("content-type") ?? "";
  if (ct.includes("application/json")) return JSON.parse(text);
  return text;
}

/**
 * One catch-all msw handler that dispatches to the scenario's route table and
 * records every request on the scenario store. Unknown paths get a 404 envelope.
 */
export function buildMswHandlers(scenario: ScenarioResult): HttpHandler[] {
  const compiled = scenario.handlers.routes.map(compile);
  const { store, controls } = scenario;
  return [
    http.all("*", async ({ request }) => {
      const url = new URL(request.url);
      const headers = headersToObject(request.headers);
      store.requests.push({
        method: request.method,
        pathname: url.pathname,
        search: url.search,
        authorization: headers["authorization"],
      });
      for (const { route, regex, names } of compiled) {
        if (route.method !== request.method) continue;
        const match = regex.exec(url.pathname);
        if (!match) continue;
        const params: Record<string, string> = {};
        names.forEach((name, i) => {
          params[name] = decodeURIComponent(match[i + 1] ?? "");
        });
        const res = route.handler({
          store,
          req: { url, method: request.method, headers, body: await readBody(request) },
          params,
          auth: controls.auth,
        });
        const resHeaders = res.headers || {};
        if (res.json !== undefined) {
          return new HttpResponse(JSON.stringify(res.json), {
            status: res.status,
            headers: { "content-type": "application/json", ...resHeaders },
          });
        }
        return new HttpResponse(res.body ?? null, { status: res.status, headers: resHeaders });
      }
      return new HttpResponse(JSON.stringify(errorEnvelope("NOT_FOUND")), {
        status: 404,
        headers: { "content-type": "application/json" },
      });
    }),
  ];
}

export * as scenarios from "@patchpull/testkit-scenarios";

import type { Logger } from "pino";
import type { Settings } from "../config/config.js";
import { InvalidFilterError, NotFoundError, PatchpullError, TransportError } from "../errors.js";
import { parseLinkHeader } from "../http/link-header.js";
import {
  ACCEPT_CONTENT,
  decodeJson,
  type QueryParams,
  type Transport,
  type TransportResponse,
} from "../http/transport.js";
import { isJsonRecord, type JsonRecord } from "../models/common.js";
import { createResourceLogger } from "../observability/logger.js";
import { isResourceType, resourceSpec, type ResourceType } from "./catalog.js";
import { ResourceCursor, type Page } from "./cursor.js";
import { buildFilterQuery, type Filters } from "./filters.js";

export interface ListOptions {
  perPage?: number;
  /** Server sort key, passed through verbatim (e.g. `-date`). */
  order?: string;
  limit?: number;
  prefetch?: number;
  /** Parent record ID for nested collections such as `checks`. */
  parent?: string;
}

export interface Download {
  content: Buffer;
  /** From `Content-Disposition`, when the server sends one. */
  filename: string | null;
}

export interface ResourceClientOptions {
  transport: Transport;
  settings: Pick<Settings, "project" | "apiVersion" | "perPage" | "allowedStates">;
  logger?: Logger;
}

export class ResourceClient {
  private readonly transport: Transport;
  private readonly settings: ResourceClientOptions["settings"];
  private readonly log: Logger;

  constructor(opts: ResourceClientOptions) {
    this.transport = opts.transport;
    this.settings = opts.settings;
    this.log = opts.logger ?? createResourceLogger();
  }

  /**
   * Lazily walk every page of a collection. Filters are validated here,
   * synchronously, so a bad filter throws before any request is made.
   */
  list(type: string, filters: Filters = {}, options: ListOptions = {}): ResourceCursor<JsonRecord> {
    const url = this.firstPageUrl(type, filters, options);
    return ResourceCursor.fromPages(url, (next) => this.fetchPage(next), {
      limit: options.limit,
      prefetch: options.prefetch,
    });
  }

  async page(type: string, filters: Filters = {}, options: ListOptions = {}): Promise<Page<JsonRecord>> {
    return this.fetchPage(this.firstPageUrl(type, filters, options));
  }

  async nextPage(page: Page<JsonRecord>): Promise<Page<JsonRecord> | null> {
    return page.next ? this.fetchPage(page.next) : null;
  }

  async get(type: string, id: string): Promise<JsonRecord> {
    const path = `${collectionPath(checkedType(type))}/${encodeURIComponent(id)}/`;
    const response = await this.notFoundAs(type, id, () => this.transport.request("GET", path));
    return expectRecord(decodeJson(response), response.url);
  }

  async update(type: string, id: string, data: JsonRecord): Promise<JsonRecord> {
    const path = `${collectionPath(checkedType(type))}/${encodeURIComponent(id)}/`;
    this.log.debug({ type, id, fields: Object.keys(data) }, "updating record");
    const response = await this.notFoundAs(type, id, () =>
      this.transport.request("PATCH", path, { body: data }),
    );
    return expectRecord(decodeJson(response), response.url);
  }

  async download(url: string): Promise<Download> {
    const response = await this.transport.request("GET", url, { accept: ACCEPT_CONTENT });
    return { content: response.body, filename: filenameOf(response.headers["content-disposition"]) };
  }

  private firstPageUrl(type: string, filters: Filters, options: ListOptions): string {
    const resource = checkedType(type);
    const spec = resourceSpec(resource);
    const query: QueryParams = {
      ...buildFilterQuery(resource, filters, {
        project: this.settings.project,
        apiVersion: this.settings.apiVersion,
        allowedStates: this.settings.allowedStates,
        logger: this.log,
      }),
      per_page: options.perPage ?? this.settings.perPage,
      order: options.order,
    };

    let path = `${spec.path}/`;
    if (spec.parent) {
      if (!options.parent) {
        throw new InvalidFilterError(`${type} are nested under ${spec.parent}; a parent id is required`);
      }
      path = `${spec.parent}/${encodeURIComponent(options.parent)}/${spec.path}/`;
    }
    return this.transport.resolve(path, query);
  }

  private async fetchPage(url: string): Promise<Page<JsonRecord>> {
    const response = await this.transport.request("GET", url);
    const body = decodeJson(response);
    if (!Array.isArray(body)) {
      throw new TransportError(`Unparseable response from ${url}: expected a list of records`);
    }
    const items = body.map((item: unknown) => expectRecord(item, url));
    const links = parseLinkHeader(response.headers.link);
    this.log.debug({ url, count: items.length, hasNext: Boolean(links.next) }, "page fetched");
    return { items, next: links.next ?? null, previous: links.prev ?? null, url };
  }

  private async notFoundAs(
    type: string,
    id: string,
    call: () => Promise<TransportResponse>,
  ): Promise<TransportResponse> {
    try {
      return await call();
    } catch (err) {
      if (err instanceof PatchpullError && err.status === 404) {
        throw NotFoundError.resource(type, id, err);
      }
      throw err;
    }
  }
}

function checkedType(type: string): ResourceType {
  if (!isResourceType(type)) throw new InvalidFilterError(`Unknown resource type "${type}"`);
  return type;
}

function collectionPath(type: ResourceType): string {
  return resourceSpec(type).path;
}

function expectRecord(value: unknown, url: string): JsonRecord {
  if (!isJsonRecord(value)) {
    throw new TransportError(`Unparseable response from ${url}: expected a record`);
  }
  return value;
}

/** `attachment; filename=foo.patch` or `filename="foo.patch"`. */
export function filenameOf(disposition: string | undefined): string | null {
  if (!disposition) return null;
  const match = /filename\*?=(?:UTF-8'')?"?([^";]+)"?/i.exec(disposition);
  return match ? decodeURIComponent(match[1].trim()) : null;
}

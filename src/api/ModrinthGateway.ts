/**
 * @file ModrinthGateway.ts
 * @module api/ModrinthGateway
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Client for the Modrinth v2 search and listing endpoints.
 *
 * Every method returns a Result: transport faults and malformed bodies become
 * TransportError, error payloads sent by the API become RemoteApplicationError.
 *
 * @example
 * ```typescript
 * const gateway = new ModrinthGateway({ apiUrl: 'https://api.modrinth.com/v2' });
 * const query = compileQuery('sodium +fabric', 0, 20);
 * if (query.ok) {
 *   const page = await gateway.search(query.value);
 * }
 * ```
 */

import type { CompiledQuery } from '../query/QueryCompiler.js';
import {
  RemoteApplicationError,
  TransportError,
  describeThrown,
  fail,
  ok,
  toAppError,
  type Result,
} from '../shared/errors.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import { asArray, asRecord, isRecord, readNumber } from './json.js';
import { Item, Release } from './models.js';

export const DEFAULT_API_URL = 'https://api.modrinth.com/v2';

export const USER_AGENT = 'modsearch/1.0.0 (interactive search client)';

/**
 * One page of results.
 */
export interface ResultPage<T> {
  readonly items: readonly T[];
  /** 0-based */
  readonly pageIndex: number;
  /** Always at least 1 */
  readonly pageCount: number;
  readonly totalHits: number;
  /** Round-trip time of the request, excluding parsing */
  readonly latencyMs: number;
}

/**
 * Full release list of one item, paginated client-side.
 */
export interface ReleaseListing {
  readonly releases: readonly Release[];
  readonly latencyMs: number;
}

/**
 * Open response body of a file download.
 */
export interface DownloadBody {
  readonly chunks: AsyncIterable<Uint8Array>;
  /** Content-Length header, when sent */
  readonly contentLength?: number;
}

/**
 * Options for ModrinthGateway.
 */
export interface ModrinthGatewayOptions {
  /** API root without trailing slash (default: https://api.modrinth.com/v2) */
  apiUrl?: string;
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
  logger?: Logger;
}

/**
 * Number of pages for a hit count; 0 hits is still 1 page.
 */
export function computePageCount(totalHits: number, pageSize: number): number {
  return Math.max(1, Math.ceil(totalHits / pageSize));
}

/**
 * Read a web stream as an async iterable, cancelling it if the consumer stops early.
 */
async function* readBody(body: NonNullable<Response['body']>): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  let finished = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      yield value;
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

function malformed(message: string, detail: string): TransportError {
  return new TransportError(`Malformed response: ${message}`, detail);
}

export class ModrinthGateway {
  private apiUrl: string;
  private fetchImpl: typeof fetch;
  private logger: Logger;

  constructor(options?: ModrinthGatewayOptions) {
    this.apiUrl = (options?.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, '');
    this.fetchImpl = options?.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options?.logger ?? silentLogger;
  }

  /**
   * Build the search URL for a compiled query.
   */
  buildSearchUrl(query: CompiledQuery): string {
    const params = new URLSearchParams({
      query: query.term,
      offset: String(query.offset),
      limit: String(query.pageSize),
    });
    if (query.sort !== undefined) {
      params.set('index', query.sort);
    }
    if (query.facets.length > 0) {
      params.set('facets', JSON.stringify(query.facets));
    }
    return `${this.apiUrl}/search?${params.toString()}`;
  }

  /**
   * Run a search for one page.
   */
  async search(query: CompiledQuery): Promise<Result<ResultPage<Item>>> {
    const response = await this.getJson(this.buildSearchUrl(query));
    if (!response.ok) {
      return response;
    }

    try {
      const data = asRecord(response.value.body, 'search response');
      const items = asArray(data.hits, '"hits"').map(hit => Item.fromSearchHit(hit));
      const totalHits = readNumber(data, 'total_hits');
      return ok({
        items,
        pageIndex: query.pageIndex,
        pageCount: computePageCount(totalHits, query.pageSize),
        totalHits,
        latencyMs: response.value.latencyMs,
      });
    } catch (error) {
      return fail(toAppError(error, malformed));
    }
  }

  /**
   * Fetch every release of an item, newest first as the API orders them.
   */
  async listReleases(itemId: string): Promise<Result<ReleaseListing>> {
    const response = await this.getJson(`${this.apiUrl}/project/${encodeURIComponent(itemId)}/version`);
    if (!response.ok) {
      return response;
    }

    try {
      const releases = asArray(response.value.body, 'version list').map(entry => Release.fromJson(entry));
      return ok({ releases, latencyMs: response.value.latencyMs });
    } catch (error) {
      return fail(toAppError(error, malformed));
    }
  }

  /**
   * Look up a single item by id or slug.
   */
  async getItem(id: string): Promise<Result<Item>> {
    const response = await this.getJson(`${this.apiUrl}/project/${encodeURIComponent(id)}`);
    if (!response.ok) {
      return response;
    }

    try {
      return ok(Item.fromProject(response.value.body));
    } catch (error) {
      return fail(toAppError(error, malformed));
    }
  }

  /**
   * Start a file download and hand back its body as a chunk stream.
   */
  async openDownload(url: string): Promise<Result<DownloadBody>> {
    this.logger.debug(`GET ${url}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { headers: { 'User-Agent': USER_AGENT } });
    } catch (error) {
      return fail(new TransportError(`Download of ${url} failed: ${String(error)}`, describeThrown(error)));
    }

    if (!response.ok) {
      await response.body?.cancel();
      return fail(new TransportError(`Download of ${url} failed: HTTP ${response.status} ${response.statusText}`));
    }
    if (!response.body) {
      return fail(new TransportError(`Download of ${url} returned no body`));
    }

    const header = response.headers.get('content-length');
    const contentLength = header !== null && /^\d+$/.test(header) ? Number(header) : undefined;
    return ok({ chunks: readBody(response.body), contentLength });
  }

  /**
   * GET a URL and decode its JSON body. Latency covers the request and
   * reading the body, not parsing.
   */
  private async getJson(url: string): Promise<Result<{ body: unknown; latencyMs: number }>> {
    this.logger.debug(`GET ${url}`);

    const startTime = Date.now();
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
      });
      text = await response.text();
    } catch (error) {
      return fail(new TransportError(`Request to ${url} failed: ${String(error)}`, describeThrown(error)));
    }
    const latencyMs = Date.now() - startTime;
    this.logger.debug(`HTTP ${response.status} in ${latencyMs}ms (${text.length} bytes)`);

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      const message = response.ok
        ? `Malformed JSON from ${url}`
        : `HTTP ${response.status} ${response.statusText} from ${url}`;
      return fail(new TransportError(message, `${describeThrown(error)}\n\nBody:\n${text.slice(0, 500)}`));
    }

    if (isRecord(body) && typeof body.error === 'string') {
      const description = typeof body.description === 'string' ? body.description : '';
      return fail(new RemoteApplicationError(body.error, description));
    }

    if (!response.ok) {
      return fail(new TransportError(`HTTP ${response.status} ${response.statusText} from ${url}`, text.slice(0, 500)));
    }

    return ok({ body, latencyMs });
  }
}

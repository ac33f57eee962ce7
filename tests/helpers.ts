/**
 * @file helpers.ts
 * @module tests/helpers
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Fixtures and an in-process fetch stand-in shared by the tests.
 */

import { Item, Release, type ItemFields, type ReleaseFields } from '../src/api/models.js';

export type JsonObject = Record<string, unknown>;

/**
 * Search hit as returned by `/search`.
 */
export function searchHit(overrides: JsonObject = {}): JsonObject {
  return {
    project_id: 'proj0001',
    slug: 'example-mod',
    project_type: 'mod',
    title: 'Example Mod',
    author: 'tester',
    description: 'A mod used in tests',
    downloads: 1234,
    follows: 56,
    categories: ['fabric', 'adventure', 'quilt'],
    versions: ['1.19.4', '1.20.1'],
    date_created: '2024-01-02T03:04:05Z',
    date_modified: '2024-06-07T08:09:10Z',
    license: 'MIT',
    client_side: 'required',
    server_side: 'optional',
    ...overrides,
  };
}

/**
 * Project as returned by `/project/{id}`.
 */
export function projectJson(overrides: JsonObject = {}): JsonObject {
  return {
    id: 'dep00001',
    slug: 'example-lib',
    project_type: 'mod',
    title: 'Example Lib',
    description: 'A library used in tests',
    downloads: 10,
    followers: 2,
    categories: ['library', 'fabric'],
    game_versions: ['1.20.1'],
    published: '2023-01-01T00:00:00Z',
    updated: '2023-02-01T00:00:00Z',
    license: { id: 'Apache-2.0', name: 'Apache License 2.0' },
    client_side: 'optional',
    server_side: 'optional',
    ...overrides,
  };
}

/**
 * Version as returned by `/project/{id}/version`.
 */
export function versionJson(overrides: JsonObject = {}): JsonObject {
  return {
    id: 'ver00001',
    version_type: 'release',
    version_number: '1.0.0',
    name: 'Example 1.0.0',
    downloads: 42,
    game_versions: ['1.20.1'],
    loaders: ['fabric'],
    files: [
      { url: 'https://cdn.example.test/example-1.0.0.jar', filename: 'example-1.0.0.jar', size: 11, primary: true },
    ],
    dependencies: [],
    date_published: '2024-02-01T00:00:00Z',
    ...overrides,
  };
}

export function makeItem(overrides: Partial<ItemFields> = {}): Item {
  return new Item({
    id: 'proj0001',
    slug: 'example-mod',
    kind: 'mod',
    title: 'Example Mod',
    author: 'tester',
    description: 'A mod used in tests',
    downloads: 1234,
    follows: 56,
    categories: ['fabric'],
    gameVersions: ['1.20.1'],
    license: 'MIT',
    clientSupport: 'required',
    serverSupport: 'optional',
    ...overrides,
  });
}

export function makeRelease(overrides: Partial<ReleaseFields> = {}): Release {
  return new Release({
    id: 'ver00001',
    maturity: 'release',
    versionNumber: '1.0.0',
    name: 'Example 1.0.0',
    downloads: 0,
    gameVersions: ['1.20.1'],
    loaders: ['fabric'],
    files: [{ url: 'https://cdn.example.test/example-1.0.0.jar', filename: 'example-1.0.0.jar', size: 11, primary: true }],
    dependencyIds: [],
    ...overrides,
  });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export type FetchHandler = (url: string) => Response | Promise<Response>;

/**
 * A fetch stand-in that records requested URLs and answers through a handler.
 */
export function fakeFetch(handler: FetchHandler): { fetch: typeof fetch; urls: string[] } {
  const urls: string[] = [];
  const fetchImpl: typeof fetch = async (input) => {
    const url = input instanceof Request ? input.url : String(input);
    urls.push(url);
    return handler(url);
  };
  return { fetch: fetchImpl, urls };
}

/**
 * Async iterable over the given chunks.
 */
export async function* chunksOf(...parts: string[]): AsyncGenerator<Uint8Array> {
  for (const part of parts) {
    yield Buffer.from(part);
  }
}

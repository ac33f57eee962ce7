/**
 * @file vocabulary.ts
 * @module query/vocabulary
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Static filter tables for the query mini-language.
 *
 * Filters are words starting with `+` (match) or `-` (exclude). Each one maps
 * to a facet clause understood by the search API and belongs to exactly one
 * facet category. See https://docs.modrinth.com/api/operations/searchprojects/
 */

import { InternalError } from '../shared/errors.js';

/**
 * Loader names. Also used to split an item's categories into loaders and tags.
 */
export const LOADERS: readonly string[] = [
  'bukkit', 'bungeecord', 'canvas', 'fabric', 'folia', 'forge', 'iris', 'liteloader', 'modloader',
  'neoforge', 'optifine', 'paper', 'purpur', 'quilt', 'rift', 'spigot', 'sponge',
  'vanilla', // shaders
  'velocity', 'waterfall',
];

export const SORT_RULES = ['relevance', 'downloads', 'follows', 'newest', 'updated'] as const;

export type SortRule = (typeof SORT_RULES)[number];

export function isSortRule(value: string): value is SortRule {
  return SORT_RULES.some(rule => rule === value);
}

/**
 * Facet categories in the order their groups are sent.
 */
export const FILTER_CATEGORIES = ['projectType', 'loader', 'platform', 'version', 'tag'] as const;

export type FilterCategory = (typeof FILTER_CATEGORIES)[number];

const PROJECT_TYPES: Record<string, string> = {
  mod: 'mod',
  resourcepack: 'resourcepack',
  rp: 'resourcepack',
  datapack: 'datapack',
  dp: 'datapack',
  modpack: 'modpack',
  mp: 'modpack',
  plugin: 'plugin',
  shader: 'shader',
};

const PLATFORM_FILTERS: Record<string, string> = {
  '+server': 'client_side!=required',
  '-server': 'client_side:required',
  '+client': 'server_side!=required',
  '-client': 'server_side:required',
  '+serverside': 'client_side!=required',
  '-serverside': 'client_side:required',
  '+clientside': 'server_side!=required',
  '-clientside': 'server_side:required',
  '+serversupported': 'server_side!=unsupported',
  '-serversupported': 'server_side:unsupported',
  '+clientsupported': 'client_side!=unsupported',
  '-clientsupported': 'client_side:unsupported',
};

function buildExactFilters(): ReadonlyMap<string, string> {
  const filters = new Map<string, string>();
  for (const [alias, type] of Object.entries(PROJECT_TYPES)) {
    filters.set(`+${alias}`, `project_type:${type}`);
    filters.set(`-${alias}`, `project_type!=${type}`);
  }
  for (const loader of LOADERS) {
    filters.set(`+${loader}`, `categories:${loader}`);
    filters.set(`-${loader}`, `categories!=${loader}`);
  }
  for (const [token, clause] of Object.entries(PLATFORM_FILTERS)) {
    filters.set(token, clause);
  }
  return filters;
}

/**
 * Exact filter token → facet clause.
 */
export const EXACT_FILTERS: ReadonlyMap<string, string> = buildExactFilters();

/**
 * Length of every parametric prefix (sign + type character).
 */
export const PARAMETRIC_PREFIX_LENGTH = 2;

/**
 * Filters that take an argument after their prefix, e.g. `+v1.20.1` or `-tcursed`.
 */
export const PARAMETRIC_FILTERS: ReadonlyMap<string, (argument: string) => string> = new Map([
  ['+v', (version: string) => `versions:${version}`],
  ['+t', (tag: string) => `categories:${tag}`],
  ['-t', (tag: string) => `categories!=${tag}`],
]);

/**
 * Members of each category: unsigned names for exact filters, the type
 * character for parametric ones.
 */
const CATEGORY_MEMBERS: Record<FilterCategory, readonly string[]> = {
  projectType: Object.keys(PROJECT_TYPES),
  loader: LOADERS,
  platform: ['server', 'client', 'serverside', 'clientside', 'serversupported', 'clientsupported'],
  version: ['v'],
  tag: ['t'],
};

/**
 * A filter word resolved against the vocabulary.
 */
export interface ResolvedFilter {
  token: string;
  inclusive: boolean;
  clause: string;
  /** Name used for category lookup */
  member: string;
}

/**
 * Resolve a filter word: exact match first, then parametric prefix.
 *
 * @returns The resolved filter, or undefined when the word is not a valid filter
 */
export function resolveFilter(token: string): ResolvedFilter | undefined {
  const inclusive = token.startsWith('+');

  const exact = EXACT_FILTERS.get(token);
  if (exact !== undefined) {
    return { token, inclusive, clause: exact, member: token.slice(1) };
  }

  const prefix = token.slice(0, PARAMETRIC_PREFIX_LENGTH);
  const build = PARAMETRIC_FILTERS.get(prefix);
  const argument = token.slice(PARAMETRIC_PREFIX_LENGTH);
  if (build && argument.length > 0) {
    return { token, inclusive, clause: build(argument), member: prefix.slice(1) };
  }

  return undefined;
}

/**
 * Find the category a resolved filter belongs to.
 *
 * @throws InternalError when the tables disagree (a filter without a category)
 */
export function categoryOf(filter: ResolvedFilter): FilterCategory {
  for (const category of FILTER_CATEGORIES) {
    if (CATEGORY_MEMBERS[category].includes(filter.member)) {
      return category;
    }
  }
  throw new InternalError(`Filter "${filter.token}" has no facet category`);
}

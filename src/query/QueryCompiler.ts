/**
 * @file QueryCompiler.ts
 * @module query/QueryCompiler
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Compiles a raw query string into the search API's request shape.
 *
 * Query words fall into three groups:
 * - `+attr` / `-attr`: filters (see vocabulary.ts)
 * - `/rule`: sort rule, at most one
 * - everything else: free-text search term
 *
 * Inclusive filters are ORed within their category, categories are ANDed.
 * Every exclusive filter becomes its own AND group, since negated clauses
 * cannot be combined with OR.
 *
 * @example
 * ```typescript
 * const result = compileQuery('foo +mod +rp -dp /downloads', 0, 20);
 * if (result.ok) {
 *   console.log(result.value.facets);
 *   // [['project_type:mod', 'project_type:resourcepack'], ['project_type!=datapack']]
 * }
 * ```
 */

import { InternalError, UserInputError, fail, ok, toAppError, type Result } from '../shared/errors.js';
import {
  FILTER_CATEGORIES,
  SORT_RULES,
  categoryOf,
  isSortRule,
  resolveFilter,
  type FilterCategory,
  type SortRule,
} from './vocabulary.js';

/**
 * A search request ready to be sent.
 */
export interface CompiledQuery {
  /** Original query text, kept for display */
  readonly raw: string;
  /** Free-text search term */
  readonly term: string;
  /** AND of OR-groups; never contains an empty group */
  readonly facets: readonly (readonly string[])[];
  /** Absent means the API default */
  readonly sort?: SortRule;
  readonly pageIndex: number;
  readonly pageSize: number;
  readonly offset: number;
}

/**
 * Split a query into words, dropping empty ones left by repeated spaces.
 */
export function splitWords(raw: string): string[] {
  return raw.split(/\s+/).filter(word => word.length > 0);
}

function isFilterWord(word: string): boolean {
  return word.startsWith('+') || word.startsWith('-');
}

function parseSort(words: string[]): Result<SortRule | undefined> {
  if (words.length > 1) {
    return fail(new UserInputError(`More than 1 sorting rule found: ${words.join(', ')}`));
  }
  if (words.length === 0) {
    return ok(undefined);
  }
  const rule = words[0].slice(1);
  if (!isSortRule(rule)) {
    return fail(new UserInputError(`Invalid sorting rule "${rule}". Valid rules: ${SORT_RULES.join(', ')}`));
  }
  return ok(rule);
}

function buildFacets(filterWords: string[]): Result<string[][]> {
  const groups = new Map<FilterCategory, string[]>(FILTER_CATEGORIES.map(category => [category, []]));
  const exclusions: string[][] = [];

  for (const word of filterWords) {
    const filter = resolveFilter(word);
    if (!filter) {
      return fail(new UserInputError(`Invalid search filter "${word}"`));
    }

    const category = categoryOf(filter);
    if (filter.inclusive) {
      const group = groups.get(category);
      if (!group) {
        throw new InternalError(`Missing facet group for category "${category}"`);
      }
      group.push(filter.clause);
    } else {
      exclusions.push([filter.clause]);
    }
  }

  const facets = [...groups.values()].filter(group => group.length > 0);
  return ok([...facets, ...exclusions]);
}

/**
 * Compile a raw query for one results page.
 *
 * Never throws: unexpected faults are returned as an InternalError result.
 *
 * @param raw - Query as typed by the user
 * @param pageIndex - 0-based page index
 * @param pageSize - Results per page
 */
export function compileQuery(raw: string, pageIndex: number, pageSize: number): Result<CompiledQuery> {
  try {
    const words = splitWords(raw);
    const filterWords = words.filter(isFilterWord);
    const sortWords = words.filter(word => word.startsWith('/'));
    const termWords = words.filter(word => !isFilterWord(word) && !word.startsWith('/'));

    const sort = parseSort(sortWords);
    if (!sort.ok) {
      return sort;
    }

    const facets = buildFacets(filterWords);
    if (!facets.ok) {
      return facets;
    }

    const query: CompiledQuery = {
      raw,
      term: termWords.join(' '),
      facets: facets.value,
      pageIndex,
      pageSize,
      offset: pageIndex * pageSize,
      ...(sort.value !== undefined ? { sort: sort.value } : {}),
    };
    return ok(query);
  } catch (error) {
    return fail(toAppError(error, message => new InternalError(message)));
  }
}

/**
 * Derive the query for another page. The original query is left untouched.
 */
export function withPage(query: CompiledQuery, pageIndex: number): CompiledQuery {
  return { ...query, pageIndex, offset: pageIndex * query.pageSize };
}

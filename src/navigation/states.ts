/**
 * @file states.ts
 * @module navigation/states
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Screens of the interactive client. Each screen value is
 * immutable; moving to another page builds a new value.
 */

import type { ResultPage } from '../api/ModrinthGateway.js';
import type { Item, Release } from '../api/models.js';
import type { CompiledQuery } from '../query/QueryCompiler.js';
import type { AppError } from '../shared/errors.js';

export interface SearchState {
  readonly kind: 'search';
}

export interface ResultsState {
  readonly kind: 'results';
  /** Query that produced the page; reissued with another offset to paginate */
  readonly query: CompiledQuery;
  readonly page: ResultPage<Item>;
}

export interface ItemDetailState {
  readonly kind: 'itemDetail';
  readonly item: Item;
  /** Complete release list, fetched once and paginated locally */
  readonly releases: readonly Release[];
  readonly releasePage: number;
  /** Search results, or the release whose dependency was opened */
  readonly parent: ResultsState | ReleaseDetailState;
}

export interface ReleaseDetailState {
  readonly kind: 'releaseDetail';
  readonly release: Release;
  /** Item the release belongs to; its slug names the download directory */
  readonly item: Item;
  readonly dependencies: readonly Item[];
  readonly parent: ItemDetailState;
}

export interface MessageState {
  readonly kind: 'message';
  readonly text: string;
  readonly parent: NavState;
}

export interface ErrorState {
  readonly kind: 'error';
  readonly error: AppError;
  readonly parent: NavState;
}

export interface QuitState {
  readonly kind: 'quit';
}

export type NavState =
  | SearchState
  | ResultsState
  | ItemDetailState
  | ReleaseDetailState
  | MessageState
  | ErrorState
  | QuitState;

export const SEARCH: SearchState = { kind: 'search' };

export const QUIT: QuitState = { kind: 'quit' };

export function errorState(error: AppError, parent: NavState): ErrorState {
  return { kind: 'error', error, parent };
}

export function messageState(text: string, parent: NavState): MessageState {
  return { kind: 'message', text, parent };
}

/**
 * @file NavigationMachine.ts
 * @module navigation/NavigationMachine
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Transition function of the interactive client.
 *
 * Screens chain search → results → item detail → release detail. Each input
 * produces at most one request; failures become an error screen that returns
 * to the screen the user came from. Nothing is retried automatically.
 *
 * @example
 * ```typescript
 * const machine = new NavigationMachine({ gateway, downloader, pageSize: 20 });
 * let state: NavState = SEARCH;
 * state = await machine.transition(state, 'sodium +fabric');
 * ```
 */

import { computePageCount, type ModrinthGateway } from '../api/ModrinthGateway.js';
import type { Item, Release } from '../api/models.js';
import type { DownloadProgressCallback, FileDownloader } from '../downloader/FileDownloader.js';
import { compileQuery, withPage, type CompiledQuery } from '../query/QueryCompiler.js';
import { matchRelease, parseQuickDownload, type ReleaseConstraint } from '../release/ReleaseMatcher.js';
import { UserInputError } from '../shared/errors.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import { isHelp, isIndexInput, isQuit, pageSlice, parseIndex, parsePageCommand } from './commands.js';
import {
  QUIT,
  SEARCH,
  errorState,
  messageState,
  type ItemDetailState,
  type NavState,
  type ReleaseDetailState,
  type ResultsState,
} from './states.js';

/**
 * Collaborators of the state machine.
 */
export interface NavigationDeps {
  gateway: Pick<ModrinthGateway, 'search' | 'listReleases' | 'getItem'>;
  downloader: Pick<FileDownloader, 'download' | 'downloadAll'>;
  /** Results per search page and releases per release page */
  pageSize: number;
  /** Text shown for the help command */
  helpText?: string;
  onProgress?: DownloadProgressCallback;
  logger?: Logger;
}

/**
 * Input that downloads every file of a release.
 */
export const DOWNLOAD_ALL = 'all';

function describeConstraint(constraint: ReleaseConstraint): string {
  return [constraint.version, constraint.loader].filter(part => part !== undefined).join(' ');
}

export class NavigationMachine {
  private deps: NavigationDeps;
  private logger: Logger;

  constructor(deps: NavigationDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Compute the screen that follows `state` after the user typed `input`.
   */
  async transition(state: NavState, input: string): Promise<NavState> {
    // Search text is never a command other than quit
    const takesCommands = state.kind === 'results' || state.kind === 'itemDetail' || state.kind === 'releaseDetail';
    if (takesCommands && isHelp(input)) {
      return messageState(this.deps.helpText ?? 'No help available.', state);
    }

    switch (state.kind) {
      case 'search':
        return isQuit(input) ? QUIT : this.runSearch(input);
      case 'results':
        return this.onResults(state, input);
      case 'itemDetail':
        return this.onItemDetail(state, input);
      case 'releaseDetail':
        return this.onReleaseDetail(state, input);
      case 'message':
      case 'error':
        return state.parent;
      case 'quit':
        return state;
    }
  }

  private async runSearch(input: string): Promise<NavState> {
    const query = compileQuery(input.trim(), 0, this.deps.pageSize);
    if (!query.ok) {
      return errorState(query.error, SEARCH);
    }
    return this.fetchResults(query.value, SEARCH);
  }

  private async fetchResults(query: CompiledQuery, parent: NavState): Promise<NavState> {
    const page = await this.deps.gateway.search(query);
    if (!page.ok) {
      return errorState(page.error, parent);
    }
    this.logger.debug(`Search "${query.raw}" page ${query.pageIndex + 1}: ${page.value.totalHits} hits`);
    return { kind: 'results', query, page: page.value };
  }

  private async onResults(state: ResultsState, input: string): Promise<NavState> {
    if (isQuit(input)) {
      return SEARCH;
    }

    const target = parsePageCommand(input, state.page.pageIndex, state.page.pageCount);
    if (target !== undefined) {
      return this.fetchResults(withPage(state.query, target), state);
    }

    const index = parseIndex(input, state.page.items.length);
    if (!index.ok) {
      return errorState(index.error, state);
    }
    return this.openItem(state.page.items[index.value], state);
  }

  private async openItem(item: Item, parent: ResultsState | ReleaseDetailState): Promise<NavState> {
    const listing = await this.deps.gateway.listReleases(item.id);
    if (!listing.ok) {
      return errorState(listing.error, parent);
    }
    return { kind: 'itemDetail', item, releases: listing.value.releases, releasePage: 0, parent };
  }

  private async onItemDetail(state: ItemDetailState, input: string): Promise<NavState> {
    if (isQuit(input)) {
      return state.parent;
    }

    const pageCount = computePageCount(state.releases.length, this.deps.pageSize);
    const target = parsePageCommand(input, state.releasePage, pageCount);
    if (target !== undefined) {
      return { ...state, releasePage: target };
    }

    if (!isIndexInput(input)) {
      const constraint = parseQuickDownload(input);
      if (constraint) {
        const release = matchRelease(state.releases, constraint);
        if (!release) {
          return messageState(`No release matches "${describeConstraint(constraint)}".`, state);
        }
        return this.openRelease(release, state);
      }
    }

    const visible = pageSlice(state.releases, state.releasePage, this.deps.pageSize);
    const index = parseIndex(input, visible.length);
    if (!index.ok) {
      return errorState(index.error, state);
    }
    return this.openRelease(visible[index.value], state);
  }

  /**
   * Resolve required dependencies, then show the release. A failed lookup
   * returns to the release list.
   */
  private async openRelease(release: Release, parent: ItemDetailState): Promise<NavState> {
    const dependencies = await release.resolveDependencies(id => this.deps.gateway.getItem(id));
    if (!dependencies.ok) {
      return errorState(dependencies.error, parent);
    }
    return { kind: 'releaseDetail', release, item: parent.item, dependencies: dependencies.value, parent };
  }

  private async onReleaseDetail(state: ReleaseDetailState, input: string): Promise<NavState> {
    const command = input.trim();
    if (isQuit(command)) {
      return state.parent;
    }

    if (command === '') {
      const primary = state.release.primaryFile;
      if (!primary) {
        return messageState('This release has no files.', state);
      }
      const result = await this.deps.downloader.download(primary, state.item.slug, this.deps.onProgress);
      if (!result.ok) {
        return errorState(result.error, state);
      }
      return messageState(`Downloaded ${primary.filename} to ${result.value}`, state);
    }

    if (command.toLowerCase() === DOWNLOAD_ALL) {
      const batch = await this.deps.downloader.downloadAll(state.release.files, state.item.slug, this.deps.onProgress);
      if (batch.failed) {
        this.logger.debug(`Batch stopped at ${batch.failed.file.filename} after ${batch.completed.length} file(s)`);
        return errorState(batch.failed.error, state);
      }
      return messageState(
        [`Downloaded ${batch.completed.length} file(s):`, ...batch.completed.map(path => `  ${path}`)].join('\n'),
        state
      );
    }

    const dependency = command.match(/^d(\d+)$/i);
    if (dependency) {
      const number = parseInt(dependency[1], 10);
      if (number < 1 || number > state.dependencies.length) {
        return errorState(
          new UserInputError(`Dependency ${number} does not exist (release has ${state.dependencies.length})`),
          state
        );
      }
      return this.openItem(state.dependencies[number - 1], state);
    }

    return state.parent;
  }
}

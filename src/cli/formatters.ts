/**
 * @file formatters.ts
 * @module cli/formatters
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Text rendering of each screen.
 */

import type { Item, Release, ReleaseFile } from '../api/models.js';
import { computePageCount } from '../api/ModrinthGateway.js';
import { pageSlice } from '../navigation/commands.js';
import { TransportError } from '../shared/errors.js';
import type {
    ErrorState,
    ItemDetailState,
    NavState,
    ReleaseDetailState,
    ResultsState,
} from '../navigation/states.js';

const SITE_URL = 'https://modrinth.com';

/** Game versions listed on the item screen */
const MAX_GAME_VERSIONS = 40;

const RULE = '='.repeat(40);

/**
 * Fit text into a column, ending cut text with an ellipsis.
 *
 * @param text - Text to fit
 * @param width - Column width
 * @param pad - Pad short text to the full width
 */
export function truncate(text: string, width = 20, pad = true): string {
    if (text.length <= width) {
        return pad ? text.padEnd(width) : text;
    }
    return text.substring(0, width - 1) + '…';
}

export function capitalize(text: string): string {
    return text.length === 0 ? text : text[0].toUpperCase() + text.substring(1);
}

function formatCount(value: number): string {
    return value.toLocaleString('en-US');
}

function formatDate(date: Date | undefined): string {
    return date ? date.toUTCString() : 'unknown';
}

function capitalizeAll(values: readonly string[]): string {
    return values.map(capitalize).join(' ');
}

/**
 * One row of the results table.
 */
export function formatItemRow(item: Item, number: number): string {
    return [
        String(number).padStart(3),
        truncate(item.id, 8),
        truncate(capitalize(item.kind), 12),
        truncate(item.title, 30),
        truncate(item.author, 20),
        `⤓${truncate(formatCount(item.downloads), 11)}`,
        `♥${truncate(formatCount(item.follows), 7)}`,
        truncate(capitalizeAll(item.loaders), 50, false),
    ].join(' ');
}

export function formatResults(state: ResultsState): string {
    const { page, query } = state;
    const lines: string[] = [];

    lines.push('  # ID       TYPE         NAME                           AUTHOR               DOWNLOADS    FOLLOWS  LOADERS');
    if (page.items.length === 0) {
        lines.push('No results found.');
    }
    page.items.forEach((item, index) => lines.push(formatItemRow(item, index + 1)));

    lines.push(
        `Page ${page.pageIndex + 1}/${page.pageCount} @ ${query.pageSize} items/page - ` +
        `${formatCount(page.totalHits)} results - Fetched in ${formatCount(page.latencyMs)}ms`
    );
    return lines.join('\n');
}

/**
 * Project summary shown above the release list.
 */
export function formatItem(item: Item): string {
    const versions = [...item.gameVersions].reverse();
    const shown = versions.slice(0, MAX_GAME_VERSIONS).join(' ');
    const more = versions.length > MAX_GAME_VERSIONS ? ' …' : '';

    return [
        `${item.title}     ⤓${formatCount(item.downloads)} ♥${formatCount(item.follows)}`,
        ...(item.author ? [`  by ${item.author}`] : []),
        '',
        item.description,
        '',
        `ID: ${item.id}`,
        `Slug: ${item.slug}`,
        `URL: ${SITE_URL}/${item.kind}/${item.slug}`,
        `Short URL: ${SITE_URL}/${item.kind}/${item.id}`,
        `Date Created: ${formatDate(item.created)}`,
        `Date Modified: ${formatDate(item.modified)}`,
        `Project Type: ${item.kind}`,
        `Client support: ${item.clientSupport}`,
        `Server support: ${item.serverSupport}`,
        `License: ${item.license || 'unknown'}`,
        '',
        `Loaders: ${capitalizeAll(item.loaders)}`,
        `Tags: ${capitalizeAll(item.tags)}`,
        `MC Versions: ${shown}${more}`,
    ].join('\n');
}

/**
 * One row of the release table.
 */
export function formatReleaseRow(release: Release, number: number): string {
    return [
        String(number).padStart(3),
        truncate(capitalize(release.maturity), 8),
        truncate(release.versionNumber, 20),
        truncate(release.gameVersions.join(' '), 30),
        truncate(capitalizeAll(release.loaders), 20),
        `⤓${formatCount(release.downloads)}`,
    ].join(' ');
}

export function formatItemDetail(state: ItemDetailState, pageSize: number): string {
    const pageCount = computePageCount(state.releases.length, pageSize);
    const visible = pageSlice(state.releases, state.releasePage, pageSize);
    const lines = [formatItem(state.item), '', '  # TYPE     VERSION              GAME VERSIONS                  LOADERS              DOWNLOADS'];

    if (visible.length === 0) {
        lines.push('No releases.');
    }
    visible.forEach((release, index) => lines.push(formatReleaseRow(release, index + 1)));
    lines.push(`Page ${state.releasePage + 1}/${pageCount} - ${formatCount(state.releases.length)} releases`);
    return lines.join('\n');
}

function formatFile(file: ReleaseFile): string {
    return `  ${file.primary ? '*' : ' '} ${file.filename} (${formatCount(file.size)} bytes)`;
}

export function formatReleaseDetail(state: ReleaseDetailState): string {
    const { release, dependencies } = state;
    const lines = [
        `${release.name || release.versionNumber} (${release.versionNumber}) for ${state.item.title}`,
        `Maturity: ${capitalize(release.maturity)}`,
        `Game versions: ${release.gameVersions.join(' ')}`,
        `Loaders: ${capitalizeAll(release.loaders)}`,
        `Published: ${formatDate(release.published)}`,
        `Downloads: ${formatCount(release.downloads)}`,
        '',
    ];

    if (dependencies.length > 0) {
        lines.push('Required dependencies:');
        dependencies.forEach((item, index) => lines.push(`  d${index + 1}. ${item.title} (${item.slug})`));
        lines.push('');
    }

    lines.push('Files (* = primary):');
    lines.push(...release.files.map(formatFile));
    return lines.join('\n');
}

export function formatError(state: ErrorState): string {
    const { error } = state;
    const body = error instanceof TransportError ? error.detail : error.message;
    return [`ERROR (${error.kind}):`, '', RULE, body.trimEnd(), RULE].join('\n');
}

/**
 * Render a screen.
 *
 * @param state - Screen to render
 * @param pageSize - Releases per page on item screens
 */
export function formatState(state: NavState, pageSize: number): string {
    switch (state.kind) {
        case 'search':
            return 'Enter a search query (q to quit).';
        case 'results':
            return formatResults(state);
        case 'itemDetail':
            return formatItemDetail(state, pageSize);
        case 'releaseDetail':
            return formatReleaseDetail(state);
        case 'message':
            return state.text;
        case 'error':
            return formatError(state);
        case 'quit':
            return 'Bye.';
    }
}

/**
 * Prompt shown while waiting for input on a screen.
 */
export function promptFor(state: NavState): string {
    switch (state.kind) {
        case 'search':
            return 'Search> ';
        case 'results':
            return 'Results [#, <, >, p<N>, q]> ';
        case 'itemDetail':
            return 'Releases [#, <, >, p<N>, <version> <loader>, q]> ';
        case 'releaseDetail':
            return 'Release [Enter = primary file, all, d<N>, q]> ';
        case 'message':
        case 'error':
            return 'Press Enter to continue> ';
        case 'quit':
            return '';
    }
}

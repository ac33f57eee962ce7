/**
 * @file formatters.test.ts
 * @module tests/unit/cli/formatters
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Unit tests for screen rendering.
 */

import {
  capitalize,
  formatError,
  formatItem,
  formatItemDetail,
  formatItemRow,
  formatReleaseDetail,
  formatReleaseRow,
  formatResults,
  formatState,
  promptFor,
  truncate,
} from '../../../src/cli/formatters.js';
import { compileQuery } from '../../../src/query/QueryCompiler.js';
import { SEARCH, errorState, messageState, type ItemDetailState } from '../../../src/navigation/states.js';
import { TransportError, UserInputError } from '../../../src/shared/errors.js';
import { makeItem, makeRelease } from '../../helpers.js';

const RULE = '='.repeat(40);

function itemDetail(releaseCount: number, releasePage = 0): ItemDetailState {
  const item = makeItem();
  const releases = Array.from({ length: releaseCount }, (_, index) =>
    makeRelease({ id: `ver${index}`, versionNumber: `1.0.${index}` })
  );
  const query = compileQuery('example', 0, 2);
  if (!query.ok) {
    throw query.error;
  }
  const parent = {
    kind: 'results' as const,
    query: query.value,
    page: { items: [item], pageIndex: 0, pageCount: 1, totalHits: 1, latencyMs: 1 },
  };
  return { kind: 'itemDetail', item, releases, releasePage, parent };
}

describe('truncate', () => {
  it('should pad short text to the column width', () => {
    expect(truncate('ab', 5)).toBe('ab   ');
  });

  it('should leave short text alone without padding', () => {
    expect(truncate('ab', 5, false)).toBe('ab');
  });

  it('should cut long text with an ellipsis', () => {
    expect(truncate('abcdefghij', 5)).toBe('abcd…');
  });

  it('should keep text of exactly the width', () => {
    expect(truncate('abcde', 5)).toBe('abcde');
  });
});

describe('capitalize', () => {
  it('should upper-case the first letter', () => {
    expect(capitalize('fabric')).toBe('Fabric');
  });

  it('should leave empty text alone', () => {
    expect(capitalize('')).toBe('');
  });
});

describe('formatItemRow', () => {
  it('should lay out the columns', () => {
    const item = makeItem({ categories: ['fabric', 'quilt', 'adventure'] });

    expect(formatItemRow(item, 1)).toBe([
      '  1',
      'proj0001',
      'Mod'.padEnd(12),
      'Example Mod'.padEnd(30),
      'tester'.padEnd(20),
      `⤓${'1,234'.padEnd(11)}`,
      `♥${'56'.padEnd(7)}`,
      'Fabric Quilt',
    ].join(' '));
  });
});

describe('formatResults', () => {
  it('should end with the page footer', () => {
    const query = compileQuery('example', 1, 2);
    if (!query.ok) {
      throw query.error;
    }
    const text = formatResults({
      kind: 'results',
      query: query.value,
      page: { items: [makeItem()], pageIndex: 1, pageCount: 3, totalHits: 1234, latencyMs: 42 },
    });
    const lines = text.split('\n');

    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('Page 2/3 @ 2 items/page - 1,234 results - Fetched in 42ms');
  });

  it('should say when nothing was found', () => {
    const query = compileQuery('nothing', 0, 20);
    if (!query.ok) {
      throw query.error;
    }
    const lines = formatResults({
      kind: 'results',
      query: query.value,
      page: { items: [], pageIndex: 0, pageCount: 1, totalHits: 0, latencyMs: 5 },
    }).split('\n');

    expect(lines[1]).toBe('No results found.');
    expect(lines[2]).toBe('Page 1/1 @ 20 items/page - 0 results - Fetched in 5ms');
  });
});

describe('formatItem', () => {
  it('should list links, support and newest game versions first', () => {
    const lines = formatItem(makeItem({ gameVersions: ['1.19.4', '1.20.1'], categories: ['fabric', 'adventure'] })).split('\n');

    expect(lines).toContain('URL: https://modrinth.com/mod/example-mod');
    expect(lines).toContain('Short URL: https://modrinth.com/mod/proj0001');
    expect(lines).toContain('Client support: required');
    expect(lines).toContain('Loaders: Fabric');
    expect(lines).toContain('Tags: Adventure');
    expect(lines[lines.length - 1]).toBe('MC Versions: 1.20.1 1.19.4');
  });

  it('should omit the author line when the author is unknown', () => {
    const lines = formatItem(makeItem({ author: '', license: '' })).split('\n');

    expect(lines[1]).toBe('');
    expect(lines).toContain('License: unknown');
  });
});

describe('formatReleaseRow', () => {
  it('should lay out the columns', () => {
    const release = makeRelease({ maturity: 'beta', versionNumber: '2.1.0', gameVersions: ['1.20', '1.20.1'], downloads: 4321 });

    expect(formatReleaseRow(release, 2)).toBe([
      '  2',
      'Beta'.padEnd(8),
      '2.1.0'.padEnd(20),
      '1.20 1.20.1'.padEnd(30),
      'Fabric'.padEnd(20),
      '⤓4,321',
    ].join(' '));
  });
});

describe('formatItemDetail', () => {
  it('should show the current release page', () => {
    const lines = formatItemDetail(itemDetail(5, 2), 2).split('\n');

    expect(lines[lines.length - 1]).toBe('Page 3/3 - 5 releases');
    expect(lines[lines.length - 2]).toContain('1.0.4');
  });

  it('should say when there are no releases', () => {
    const lines = formatItemDetail(itemDetail(0), 2).split('\n');

    expect(lines.slice(-2)).toEqual(['No releases.', 'Page 1/1 - 0 releases']);
  });
});

describe('formatReleaseDetail', () => {
  it('should list dependencies and mark the primary file', () => {
    const parent = itemDetail(1);
    const release = makeRelease({
      files: [
        { url: 'https://cdn.example.test/main.jar', filename: 'main.jar', size: 2048, primary: true },
        { url: 'https://cdn.example.test/sources.jar', filename: 'sources.jar', size: 5, primary: false },
      ],
    });
    const dependency = makeItem({ title: 'Example Lib', slug: 'example-lib' });

    const lines = formatReleaseDetail({
      kind: 'releaseDetail',
      release,
      item: parent.item,
      dependencies: [dependency],
      parent,
    }).split('\n');

    expect(lines[0]).toBe('Example 1.0.0 (1.0.0) for Example Mod');
    expect(lines).toContain('  d1. Example Lib (example-lib)');
    expect(lines.slice(-3)).toEqual([
      'Files (* = primary):',
      '  * main.jar (2,048 bytes)',
      '    sources.jar (5 bytes)',
    ]);
  });
});

describe('formatError', () => {
  it('should show the message of a user error between rules', () => {
    expect(formatError(errorState(new UserInputError('Invalid search filter "+x"'), SEARCH))).toBe(
      ['ERROR (user-input):', '', RULE, 'Invalid search filter "+x"', RULE].join('\n')
    );
  });

  it('should show the full detail of a transport error', () => {
    const error = new TransportError('Request failed', 'Error: Request failed\n    at fetch\n');

    expect(formatError(errorState(error, SEARCH))).toBe(
      ['ERROR (transport):', '', RULE, 'Error: Request failed\n    at fetch', RULE].join('\n')
    );
  });
});

describe('formatState and promptFor', () => {
  it('should render messages as their text', () => {
    expect(formatState(messageState('Done.', SEARCH), 20)).toBe('Done.');
  });

  it('should prompt for a query on the search screen', () => {
    expect(promptFor(SEARCH)).toBe('Search> ');
    expect(promptFor(messageState('Done.', SEARCH))).toBe('Press Enter to continue> ');
  });
});

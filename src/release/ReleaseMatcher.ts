/**
 * @file ReleaseMatcher.ts
 * @module release/ReleaseMatcher
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Quick download: pick a release by game version and/or loader
 * instead of by index.
 *
 * @example
 * ```typescript
 * const constraint = parseQuickDownload('1.20.1 fabric');
 * // { version: '1.20.1', loader: 'fabric' }
 * const release = constraint && matchRelease(releases, constraint);
 * ```
 */

import { maturityRank, type Release } from '../api/models.js';
import { LOADERS } from '../query/vocabulary.js';

/**
 * Requirements a release must meet. At least one field is set.
 */
export interface ReleaseConstraint {
  version?: string;
  loader?: string;
}

/**
 * Prefix marking an explicit game version word, as in query filters (`v1.20.1`).
 */
export const VERSION_PREFIX = 'v';

// Bare release (1.20.1) and snapshot (23w14a) game versions
const BARE_VERSION = /^(\d+\.\d+[\w.+-]*|\d{2}w\d{2}[a-z])$/;

function parseVersionWord(word: string): string | undefined {
  if (word.startsWith(VERSION_PREFIX) && word.length > VERSION_PREFIX.length) {
    return word.slice(VERSION_PREFIX.length);
  }
  if (BARE_VERSION.test(word)) {
    return word;
  }
  return undefined;
}

/**
 * Recognize a quick-download request.
 *
 * Every word must be either a version word or an exact loader name, with at
 * most one of each and at least one in total. Anything else means the input
 * is not a quick download.
 *
 * @returns The constraint, or undefined when the input does not qualify
 */
export function parseQuickDownload(input: string): ReleaseConstraint | undefined {
  const words = input.trim().split(/\s+/).filter(word => word.length > 0);
  let version: string | undefined;
  let loader: string | undefined;

  for (const word of words) {
    if (LOADERS.includes(word)) {
      if (loader !== undefined) {
        return undefined;
      }
      loader = word;
      continue;
    }

    const parsed = parseVersionWord(word);
    if (parsed === undefined || version !== undefined) {
      return undefined;
    }
    version = parsed;
  }

  if (version === undefined && loader === undefined) {
    return undefined;
  }
  return {
    ...(version !== undefined ? { version } : {}),
    ...(loader !== undefined ? { loader } : {}),
  };
}

/**
 * Whether a release satisfies every set field of a constraint.
 */
export function satisfies(release: Release, constraint: ReleaseConstraint): boolean {
  const versionOk = constraint.version === undefined || release.gameVersions.includes(constraint.version);
  const loaderOk = constraint.loader === undefined || release.loaders.includes(constraint.loader);
  return versionOk && loaderOk;
}

/**
 * Pick the most mature release meeting the constraint.
 *
 * Releases at the same maturity are not compared further: the first one in
 * list order wins.
 *
 * @returns The chosen release, or undefined when none qualifies
 * @throws RangeError when the constraint sets neither field
 */
export function matchRelease(releases: readonly Release[], constraint: ReleaseConstraint): Release | undefined {
  if (constraint.version === undefined && constraint.loader === undefined) {
    throw new RangeError('A quick download needs a version or a loader');
  }

  let best: Release | undefined;
  for (const release of releases) {
    if (!satisfies(release, constraint)) {
      continue;
    }
    if (best === undefined || maturityRank(release.maturity) > maturityRank(best.maturity)) {
      best = release;
    }
  }
  return best;
}

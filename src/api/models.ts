/**
 * @file models.ts
 * @module api/models
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Domain objects built from API responses: items (projects),
 * releases (versions) and their files.
 */

import { LOADERS } from '../query/vocabulary.js';
import { fail, ok, type Result } from '../shared/errors.js';
import { toLocalFileName } from '../shared/utils/sanitize.js';
import {
  asArray,
  asRecord,
  readBoolean,
  readDate,
  readNumber,
  readOptionalString,
  readString,
  readStringArray,
  type JsonRecord,
} from './json.js';

/**
 * Release maturity as reported by the API, least to most stable.
 */
export const MATURITY_LEVELS = ['alpha', 'beta', 'release'] as const;

export type Maturity = (typeof MATURITY_LEVELS)[number];

export function maturityRank(maturity: Maturity): number {
  return MATURITY_LEVELS.indexOf(maturity);
}

function readMaturity(record: JsonRecord): Maturity {
  const value = readString(record, 'version_type');
  const level = MATURITY_LEVELS.find(candidate => candidate === value);
  // Unknown values rank lowest
  return level ?? 'alpha';
}

/**
 * Fields needed to construct an Item.
 */
export interface ItemFields {
  id: string;
  slug: string;
  kind: string;
  title: string;
  author: string;
  description: string;
  downloads: number;
  follows: number;
  categories: readonly string[];
  gameVersions: readonly string[];
  created?: Date;
  modified?: Date;
  license: string;
  clientSupport: string;
  serverSupport: string;
}

/**
 * A searchable project.
 */
export class Item implements ItemFields {
  readonly id: string;
  readonly slug: string;
  readonly kind: string;
  readonly title: string;
  readonly author: string;
  readonly description: string;
  readonly downloads: number;
  readonly follows: number;
  readonly categories: readonly string[];
  readonly gameVersions: readonly string[];
  readonly created?: Date;
  readonly modified?: Date;
  readonly license: string;
  readonly clientSupport: string;
  readonly serverSupport: string;

  /** Categories that are loader names */
  readonly loaders: readonly string[];
  /** All other categories */
  readonly tags: readonly string[];

  constructor(fields: ItemFields) {
    this.id = fields.id;
    this.slug = fields.slug;
    this.kind = fields.kind;
    this.title = fields.title;
    this.author = fields.author;
    this.description = fields.description;
    this.downloads = fields.downloads;
    this.follows = fields.follows;
    this.categories = [...fields.categories];
    this.gameVersions = [...fields.gameVersions];
    this.created = fields.created;
    this.modified = fields.modified;
    this.license = fields.license;
    this.clientSupport = fields.clientSupport;
    this.serverSupport = fields.serverSupport;

    this.loaders = this.categories.filter(category => LOADERS.includes(category));
    this.tags = this.categories.filter(category => !LOADERS.includes(category));
  }

  /**
   * Build from a search hit (`/search` → `hits[]`).
   */
  static fromSearchHit(value: unknown): Item {
    const hit = asRecord(value, 'search hit');
    return new Item({
      id: readString(hit, 'project_id'),
      slug: readString(hit, 'slug'),
      kind: readString(hit, 'project_type'),
      title: readString(hit, 'title'),
      author: readOptionalString(hit, 'author'),
      description: readOptionalString(hit, 'description'),
      downloads: readNumber(hit, 'downloads'),
      follows: readNumber(hit, 'follows'),
      categories: readStringArray(hit, 'categories'),
      gameVersions: readStringArray(hit, 'versions'),
      created: readDate(hit, 'date_created'),
      modified: readDate(hit, 'date_modified'),
      license: readOptionalString(hit, 'license'),
      clientSupport: readOptionalString(hit, 'client_side', 'unknown'),
      serverSupport: readOptionalString(hit, 'server_side', 'unknown'),
    });
  }

  /**
   * Build from a project lookup (`/project/{id}`), which names fields
   * differently and carries no author.
   */
  static fromProject(value: unknown): Item {
    const project = asRecord(value, 'project');
    const license = project.license;
    return new Item({
      id: readString(project, 'id'),
      slug: readString(project, 'slug'),
      kind: readString(project, 'project_type'),
      title: readString(project, 'title'),
      author: '',
      description: readOptionalString(project, 'description'),
      downloads: readNumber(project, 'downloads'),
      follows: readNumber(project, 'followers'),
      categories: readStringArray(project, 'categories'),
      gameVersions: readStringArray(project, 'game_versions'),
      created: readDate(project, 'published'),
      modified: readDate(project, 'updated'),
      license: typeof license === 'object' && license !== null
        ? readOptionalString(asRecord(license, 'license'), 'id')
        : readOptionalString(project, 'license'),
      clientSupport: readOptionalString(project, 'client_side', 'unknown'),
      serverSupport: readOptionalString(project, 'server_side', 'unknown'),
    });
  }
}

/**
 * A downloadable file of a release.
 */
export interface ReleaseFile {
  readonly url: string;
  /** Basename only; directory components from the server are stripped */
  readonly filename: string;
  readonly size: number;
  readonly primary: boolean;
}

export function releaseFileFromJson(value: unknown): ReleaseFile {
  const file = asRecord(value, 'file');
  return {
    url: readString(file, 'url'),
    filename: toLocalFileName(readString(file, 'filename')),
    size: readNumber(file, 'size'),
    primary: readBoolean(file, 'primary'),
  };
}

/**
 * Mark exactly one file primary: the first marked one, or the first file.
 */
function normalizePrimary(files: ReleaseFile[]): ReleaseFile[] {
  const primaryIndex = Math.max(0, files.findIndex(file => file.primary));
  return files.map((file, index) => ({ ...file, primary: index === primaryIndex }));
}

/**
 * Fields needed to construct a Release.
 */
export interface ReleaseFields {
  id: string;
  maturity: Maturity;
  versionNumber: string;
  name: string;
  downloads: number;
  gameVersions: readonly string[];
  loaders: readonly string[];
  files: readonly ReleaseFile[];
  dependencyIds: readonly string[];
  published?: Date;
}

export type ItemLookup = (id: string) => Promise<Result<Item>>;

/**
 * A published version of an item.
 */
export class Release {
  readonly id: string;
  readonly maturity: Maturity;
  readonly versionNumber: string;
  readonly name: string;
  readonly downloads: number;
  readonly gameVersions: readonly string[];
  readonly loaders: readonly string[];
  readonly files: readonly ReleaseFile[];
  /** Ids of required dependency items */
  readonly dependencyIds: readonly string[];
  readonly published?: Date;

  private dependencies?: readonly Item[];

  constructor(fields: ReleaseFields) {
    this.id = fields.id;
    this.maturity = fields.maturity;
    this.versionNumber = fields.versionNumber;
    this.name = fields.name;
    this.downloads = fields.downloads;
    this.gameVersions = [...fields.gameVersions];
    this.loaders = [...fields.loaders];
    this.files = normalizePrimary([...fields.files]);
    this.dependencyIds = [...fields.dependencyIds];
    this.published = fields.published;
  }

  /**
   * The file downloaded by default. Undefined only for a release without files.
   */
  get primaryFile(): ReleaseFile | undefined {
    return this.files.find(file => file.primary);
  }

  /**
   * Dependencies resolved so far, if any lookup has completed.
   */
  get resolvedDependencies(): readonly Item[] | undefined {
    return this.dependencies;
  }

  /**
   * Look up required dependencies, one request per id. The result is cached
   * on this release; a failed lookup caches nothing.
   */
  async resolveDependencies(lookup: ItemLookup): Promise<Result<readonly Item[]>> {
    if (this.dependencies) {
      return ok(this.dependencies);
    }

    const items: Item[] = [];
    for (const id of this.dependencyIds) {
      const result = await lookup(id);
      if (!result.ok) {
        return fail(result.error);
      }
      items.push(result.value);
    }

    this.dependencies = items;
    return ok(items);
  }

  /**
   * Build from a version object (`/project/{id}/version` → `[]`).
   * Only dependencies of type "required" are kept.
   */
  static fromJson(value: unknown): Release {
    const version = asRecord(value, 'version');
    const dependencyIds: string[] = [];
    for (const entry of asArray(version.dependencies ?? [], '"dependencies"')) {
      const dependency = asRecord(entry, 'dependency');
      const projectId = dependency.project_id;
      if (dependency.dependency_type === 'required' && typeof projectId === 'string') {
        dependencyIds.push(projectId);
      }
    }

    return new Release({
      id: readString(version, 'id'),
      maturity: readMaturity(version),
      versionNumber: readString(version, 'version_number'),
      name: readOptionalString(version, 'name'),
      downloads: readNumber(version, 'downloads'),
      gameVersions: readStringArray(version, 'game_versions'),
      loaders: readStringArray(version, 'loaders'),
      files: asArray(version.files, '"files"').map(releaseFileFromJson),
      dependencyIds,
      published: readDate(version, 'date_published'),
    });
  }
}

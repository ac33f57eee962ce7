/**
 * @file FileDownloader.ts
 * @module downloader/FileDownloader
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Streams release files to `<rootDir>/<slug>/<filename>`.
 *
 * Bodies are written in fixed-size chunks with a running byte count reported
 * after each one. Batches run one file at a time and stop at the first
 * failure; files already written stay on disk and a partially written file
 * is not removed. The target file is created before the request is sent, and
 * removed again if the request fails.
 */

import { mkdir, open, rm, type FileHandle } from 'node:fs/promises';
import { join } from 'node:path';
import { pipeline } from 'node:stream/promises';

import type { ModrinthGateway } from '../api/ModrinthGateway.js';
import type { ReleaseFile } from '../api/models.js';
import { ResourceFault, TransportError, describeThrown, fail, ok, type AppError, type Result } from '../shared/errors.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import { toDirectoryName } from '../shared/utils/sanitize.js';

export const DEFAULT_CHUNK_SIZE = 8 * 1024;

/**
 * Progress callback for a single file.
 *
 * @param received - Bytes written so far
 * @param expected - Size announced for the file (0 when unknown)
 * @param file - The file being downloaded
 */
export type DownloadProgressCallback = (received: number, expected: number, file: ReleaseFile) => void;

/**
 * Outcome of a multi-file download.
 */
export interface BatchDownloadResult {
  /** Paths written completely, in order */
  completed: string[];
  /** The file that stopped the batch, if any */
  failed?: { file: ReleaseFile; error: AppError };
}

/**
 * Options for FileDownloader.
 */
export interface FileDownloaderOptions {
  /** Root download directory */
  rootDir: string;
  /** Write chunk size in bytes (default: 8 KiB) */
  chunkSize?: number;
  logger?: Logger;
}

/**
 * Re-slice a byte stream into chunks of exactly `size` bytes (the last may be shorter).
 */
export async function* rechunk(source: AsyncIterable<Uint8Array>, size: number): AsyncGenerator<Buffer> {
  let pending = Buffer.alloc(0);
  for await (const chunk of source) {
    pending = pending.length === 0 ? Buffer.from(chunk) : Buffer.concat([pending, chunk]);
    while (pending.length >= size) {
      yield pending.subarray(0, size);
      pending = pending.subarray(size);
    }
  }
  if (pending.length > 0) {
    yield pending;
  }
}

export class FileDownloader {
  private gateway: Pick<ModrinthGateway, 'openDownload'>;
  private rootDir: string;
  private chunkSize: number;
  private logger: Logger;

  constructor(gateway: Pick<ModrinthGateway, 'openDownload'>, options: FileDownloaderOptions) {
    this.gateway = gateway;
    this.rootDir = options.rootDir;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Local path a file of an item is written to.
   */
  resolvePath(file: ReleaseFile, slug: string): string {
    return join(this.rootDir, toDirectoryName(slug), file.filename);
  }

  /**
   * Download one file.
   *
   * @returns The written path
   */
  async download(file: ReleaseFile, slug: string, onProgress?: DownloadProgressCallback): Promise<Result<string>> {
    const filePath = this.resolvePath(file, slug);
    const dir = join(this.rootDir, toDirectoryName(slug));

    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      return fail(new ResourceFault(`Cannot create directory ${dir}: ${String(error)}`, dir));
    }

    // Target first: no request is sent for a path that cannot be written
    let target: FileHandle;
    try {
      target = await open(filePath, 'w');
    } catch (error) {
      return fail(new ResourceFault(`Cannot write ${filePath}: ${String(error)}`, filePath));
    }

    const opened = await this.gateway.openDownload(file.url);
    if (!opened.ok) {
      try {
        await target.close();
        await rm(filePath, { force: true });
      } catch (error) {
        this.logger.debug(`Cannot remove ${filePath}: ${String(error)}`);
      }
      return opened;
    }

    const expected = file.size > 0 ? file.size : (opened.value.contentLength ?? 0);
    const chunkSize = this.chunkSize;
    let received = 0;
    let transferError: unknown;

    async function* counted(source: AsyncIterable<Uint8Array>): AsyncGenerator<Buffer> {
      try {
        for await (const chunk of rechunk(source, chunkSize)) {
          received += chunk.length;
          yield chunk;
          onProgress?.(received, expected, file);
        }
      } catch (error) {
        transferError = error;
        throw error;
      }
    }

    try {
      await pipeline(counted(opened.value.chunks), target.createWriteStream());
    } catch (error) {
      if (transferError !== undefined) {
        return fail(new TransportError(
          `Transfer of ${file.filename} failed after ${received} bytes: ${String(transferError)}`,
          describeThrown(transferError)
        ));
      }
      return fail(new ResourceFault(`Cannot write ${filePath}: ${String(error)}`, filePath));
    }

    this.logger.debug(`Wrote ${received} bytes to ${filePath}`);
    return ok(filePath);
  }

  /**
   * Download files one after another, stopping at the first failure.
   */
  async downloadAll(
    files: readonly ReleaseFile[],
    slug: string,
    onProgress?: DownloadProgressCallback
  ): Promise<BatchDownloadResult> {
    const completed: string[] = [];
    for (const file of files) {
      const result = await this.download(file, slug, onProgress);
      if (!result.ok) {
        return { completed, failed: { file, error: result.error } };
      }
      completed.push(result.value);
    }
    return { completed };
  }
}

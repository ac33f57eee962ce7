/**
 * @file progress.ts
 * @module cli/progress
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Single-line download progress display.
 */

import type { ReleaseFile } from '../api/models.js';

export interface TextSink {
  write(text: string): unknown;
}

/**
 * Rewrites one status line per chunk, then ends it with finish().
 */
export class ProgressReporter {
  private sink: TextSink;
  private lineOpen = false;

  constructor(sink: TextSink = process.stdout) {
    this.sink = sink;
  }

  /**
   * Matches DownloadProgressCallback.
   */
  update = (received: number, expected: number, file: ReleaseFile): void => {
    const amount = expected > 0
      ? `${received.toLocaleString('en-US')}/${expected.toLocaleString('en-US')} bytes (${Math.floor((received / expected) * 100)}%)`
      : `${received.toLocaleString('en-US')} bytes`;
    this.sink.write(`\r${file.filename}: ${amount}    `);
    this.lineOpen = true;
  };

  /**
   * Terminate the status line, if one is showing.
   */
  finish(): void {
    if (this.lineOpen) {
      this.sink.write('\n');
      this.lineOpen = false;
    }
  }
}

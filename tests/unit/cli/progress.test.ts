/**
 * @file progress.test.ts
 * @module tests/unit/cli/progress
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Unit tests for the download progress line.
 */

import { ProgressReporter } from '../../../src/cli/progress.js';
import type { ReleaseFile } from '../../../src/api/models.js';

const file: ReleaseFile = { url: 'https://cdn.example.test/example.jar', filename: 'example.jar', size: 2048, primary: true };

describe('ProgressReporter', () => {
  let written: string[];
  let reporter: ProgressReporter;

  beforeEach(() => {
    written = [];
    reporter = new ProgressReporter({ write: (text: string) => written.push(text) });
  });

  it('should rewrite the line with bytes and percentage', () => {
    reporter.update(512, 2048, file);
    reporter.update(2048, 2048, file);

    expect(written).toEqual([
      '\rexample.jar: 512/2,048 bytes (25%)    ',
      '\rexample.jar: 2,048/2,048 bytes (100%)    ',
    ]);
  });

  it('should show only the byte count when the size is unknown', () => {
    reporter.update(1500, 0, file);

    expect(written).toEqual(['\rexample.jar: 1,500 bytes    ']);
  });

  it('should end an open line once', () => {
    reporter.update(1, 2, file);
    reporter.finish();
    reporter.finish();

    expect(written.slice(1)).toEqual(['\n']);
  });

  it('should write nothing on finish without progress', () => {
    reporter.finish();

    expect(written).toEqual([]);
  });
});

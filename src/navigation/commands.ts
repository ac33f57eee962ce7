/**
 * @file commands.ts
 * @module navigation/commands
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Parsing of the short commands typed on list screens.
 *
 * - `q`, `quit`, `exit`: leave the screen
 * - `h`, `help`: show help
 * - `<` / `>`: previous / next page, wrapping around
 * - `p<N>`: jump to page N (1-based), wrapping around
 * - `<N>`: select entry N (1-based) on the current page
 */

import { UserInputError, fail, ok, type Result } from '../shared/errors.js';

const QUIT_WORDS = ['q', 'quit', 'exit'];
const HELP_WORDS = ['h', 'help', '?'];

export function isQuit(input: string): boolean {
  return QUIT_WORDS.includes(input.trim().toLowerCase());
}

export function isHelp(input: string): boolean {
  return HELP_WORDS.includes(input.trim().toLowerCase());
}

/**
 * Wrap a page index into [0, pageCount).
 */
export function wrapPage(index: number, pageCount: number): number {
  return ((index % pageCount) + pageCount) % pageCount;
}

/**
 * Interpret a page navigation command.
 *
 * @returns The new 0-based page index, or undefined if the input is not a page command
 */
export function parsePageCommand(input: string, currentPage: number, pageCount: number): number | undefined {
  const command = input.trim();
  if (command === '<') {
    return wrapPage(currentPage - 1, pageCount);
  }
  if (command === '>') {
    return wrapPage(currentPage + 1, pageCount);
  }
  const match = command.match(/^p(-?\d+)$/i);
  if (match) {
    return wrapPage(parseInt(match[1], 10) - 1, pageCount);
  }
  return undefined;
}

export function isIndexInput(input: string): boolean {
  return /^\d+$/.test(input.trim());
}

/**
 * Parse a 1-based entry number against the number of visible entries.
 *
 * @returns The 0-based index
 */
export function parseIndex(input: string, count: number): Result<number> {
  const text = input.trim();
  if (!isIndexInput(text)) {
    return fail(new UserInputError(`Unrecognized command "${text}"`));
  }
  const number = parseInt(text, 10);
  if (number < 1 || number > count) {
    return fail(new UserInputError(
      count === 0
        ? `Nothing to select: the list is empty`
        : `Number ${number} is out of range (1-${count})`
    ));
  }
  return ok(number - 1);
}

/**
 * Slice of a list shown on a given page.
 */
export function pageSlice<T>(list: readonly T[], pageIndex: number, pageSize: number): readonly T[] {
  return list.slice(pageIndex * pageSize, (pageIndex + 1) * pageSize);
}

/**
 * @file session.ts
 * @module cli/session
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Read-render loop driving the navigation state machine.
 */

import { createInterface } from 'node:readline/promises';

import type { NavigationMachine } from '../navigation/NavigationMachine.js';
import { SEARCH, type NavState } from '../navigation/states.js';
import { formatState, promptFor } from './formatters.js';

/**
 * Terminal access used by the session.
 */
export interface SessionIO {
  /** Resolves undefined at end of input */
  prompt(text: string): Promise<string | undefined>;
  print(text: string): void;
  close(): void;
}

export interface SessionOptions {
  pageSize: number;
  /** Query to run before the first prompt */
  initialQuery?: string;
}

/**
 * Run screens until the user quits or input ends.
 *
 * @returns The final state
 */
export async function runSession(
  machine: Pick<NavigationMachine, 'transition'>,
  io: SessionIO,
  options: SessionOptions
): Promise<NavState> {
  let state: NavState = SEARCH;
  if (options.initialQuery !== undefined && options.initialQuery.trim() !== '') {
    state = await machine.transition(state, options.initialQuery);
  }

  try {
    while (state.kind !== 'quit') {
      io.print(formatState(state, options.pageSize));
      const input = await io.prompt(promptFor(state));
      if (input === undefined) {
        break;
      }
      state = await machine.transition(state, input);
    }
  } finally {
    io.close();
  }
  return state;
}

/**
 * SessionIO over stdin/stdout.
 *
 * @param beforePrint - Called before each screen, e.g. to end a progress line
 */
export function createTerminalIO(beforePrint?: () => void): SessionIO {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  const whenClosed = new Promise<undefined>(resolve => {
    rl.once('close', () => {
      closed = true;
      resolve(undefined);
    });
  });

  return {
    async prompt(text: string): Promise<string | undefined> {
      if (closed) {
        return undefined;
      }
      const answer = rl.question(text).catch((error: unknown) => {
        // Pending questions are aborted when input ends
        if (closed || (error instanceof Error && error.name === 'AbortError')) {
          return undefined;
        }
        throw error;
      });
      return Promise.race([answer, whenClosed]);
    },
    print(text: string): void {
      beforePrint?.();
      console.log(`\n${text}`);
    },
    close(): void {
      if (!closed) {
        rl.close();
      }
    },
  };
}

/**
 * @file json.ts
 * @module api/json
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Typed field access on decoded JSON. A missing or mistyped
 * field raises MalformedResponseError, which the gateway reports as a
 * transport error.
 */

export type JsonRecord = Record<string, unknown>;

export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown, what: string): JsonRecord {
  if (!isRecord(value)) {
    throw new MalformedResponseError(`Expected ${what} to be an object`);
  }
  return value;
}

export function asArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new MalformedResponseError(`Expected ${what} to be an array`);
  }
  return value;
}

export function readString(record: JsonRecord, key: string): string {
  const value = record[key];
  if (typeof value !== 'string') {
    throw new MalformedResponseError(`Expected "${key}" to be a string`);
  }
  return value;
}

export function readOptionalString(record: JsonRecord, key: string, fallback = ''): string {
  const value = record[key];
  return typeof value === 'string' ? value : fallback;
}

export function readNumber(record: JsonRecord, key: string): number {
  const value = record[key];
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new MalformedResponseError(`Expected "${key}" to be a number`);
  }
  return value;
}

export function readBoolean(record: JsonRecord, key: string): boolean {
  return record[key] === true;
}

export function readStringArray(record: JsonRecord, key: string): string[] {
  const value = record[key];
  if (value === undefined || value === null) {
    return [];
  }
  return asArray(value, `"${key}"`).map((entry, index) => {
    if (typeof entry !== 'string') {
      throw new MalformedResponseError(`Expected "${key}[${index}]" to be a string`);
    }
    return entry;
  });
}

export function readDate(record: JsonRecord, key: string): Date | undefined {
  const value = record[key];
  if (typeof value !== 'string') {
    return undefined;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Multipart part validation
 * Zod schemas for the two legal part shapes
 */

import { z } from 'zod';
import type { InvalidPart } from '../errors/index.js';
import type { FieldPart, FilePart, Part } from '../types/request.js';

export const PART_GUIDANCE = `A valid multipart part looks like one of the following:
[name, data]
["file", filename, extra, headers]
name: a string
data: a string
filename: a string
extra: a plain object
headers: an array of [name, value] string pairs
`;

const FieldPartSchema = z.tuple([z.string(), z.string()]);

const FilePartSchema = z.tuple([
  z.literal('file'),
  z.string(),
  z.record(z.string(), z.unknown()),
  z.array(z.tuple([z.string(), z.string()])),
]);

export function isFieldPart(value: unknown): value is FieldPart {
  return FieldPartSchema.safeParse(value).success;
}

export function isFilePart(value: unknown): value is FilePart {
  return FilePartSchema.safeParse(value).success;
}

export interface PartsValidation<P> {
  readonly valid: P[];
  readonly invalid: InvalidPart[];
}

/**
 * Check every entry; valid entries are kept as the caller passed them
 */
export function validateParts(entries: readonly unknown[]): PartsValidation<Part> {
  return partition(entries, (value): value is Part => isFieldPart(value) || isFilePart(value));
}

/**
 * Same as validateParts, but only the file shape is accepted
 */
export function validateFileParts(entries: readonly unknown[]): PartsValidation<FilePart> {
  return partition(entries, isFilePart);
}

function partition<P>(
  entries: readonly unknown[],
  accept: (value: unknown) => value is P
): PartsValidation<P> {
  const valid: P[] = [];
  const invalid: InvalidPart[] = [];
  for (const value of entries) {
    if (accept(value)) valid.push(value);
    else invalid.push({ value, guidance: PART_GUIDANCE });
  }
  return { valid, invalid };
}

/**
 * MIME type resolution
 * Static extension table with a generic binary fallback; lookups never fail.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const MimeTableSchema = z.record(z.string(), z.string());

// extension -> MIME type, kept beside this module
const table = MimeTableSchema.parse(
  JSON.parse(readFileSync(new URL('./mime-types.json', import.meta.url), 'utf8'))
);

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

/**
 * How `getMimeType` reads its token
 * - "ext": an extension such as "xml" or ".XML", or an already complete MIME type
 * - "path": a file name or path whose extension is looked up
 */
export type MimeLookupMode = 'ext' | 'path';

const MIME_PATTERN = /^[a-z0-9][\w.+-]*\/[\w.+-]+$/;

const byExtension: ReadonlyMap<string, string> = new Map(Object.entries(table));

const byMimeType: ReadonlyMap<string, readonly string[]> = (() => {
  const reverse = new Map<string, string[]>();
  for (const [ext, mime] of byExtension) {
    const list = reverse.get(mime);
    if (list) list.push(ext);
    else reverse.set(mime, [ext]);
  }
  return reverse;
})();

function extensionOf(path: string): string {
  const base = path.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(dot + 1) : '';
}

/**
 * Resolve a short token to a full MIME type string.
 * Unknown tokens resolve to `application/octet-stream`.
 */
export function getMimeType(token: string, mode: MimeLookupMode = 'ext'): string {
  const normalized = token.trim().toLowerCase();

  if (mode === 'path') {
    return byExtension.get(extensionOf(normalized)) ?? DEFAULT_MIME_TYPE;
  }

  if (MIME_PATTERN.test(normalized)) return normalized;

  const ext = normalized.startsWith('.') ? normalized.slice(1) : normalized;
  return byExtension.get(ext) ?? DEFAULT_MIME_TYPE;
}

/**
 * Reverse lookup: every known extension for a MIME type, in table order
 */
export function getExtensions(mimeType: string): readonly string[] {
  const base = mimeType.split(';')[0].trim().toLowerCase();
  return byMimeType.get(base) ?? [];
}

import { readFile as readFileFromDisk } from 'node:fs/promises';
import { basename } from 'node:path';
import { getExtensions, getMimeType } from '../mime/index.js';
import type { FilePart, Part } from '../types/request.js';

export interface FormDataOptions {
  /** Reads a file part's bytes when it carries no inline `extra.content` */
  readFile?: (path: string) => Promise<Uint8Array>;
}

function isFile(part: Part): part is FilePart {
  return part.length === 4;
}

function headerValue(part: FilePart, name: string): string | undefined {
  return part[3].find(([key]) => key.toLowerCase() === name)?.[1];
}

/**
 * File name sent in the part's content-disposition.
 * A name without extension borrows one from the declared content type.
 */
function uploadName(filename: string, contentType: string | undefined): string {
  const name = basename(filename);
  if (name.includes('.') || !contentType) return name;
  const [ext] = getExtensions(contentType);
  return ext ? `${name}.${ext}` : name;
}

/**
 * Encode multipart parts as FormData.
 * Only a file part's content-type header is carried; FormData has no slot for others.
 */
export async function toFormData(parts: readonly Part[], options: FormDataOptions = {}): Promise<FormData> {
  const readFile = options.readFile ?? readFileFromDisk;
  const form = new FormData();

  for (const part of parts) {
    if (!isFile(part)) {
      form.append(part[0], part[1]);
      continue;
    }

    const [, filename, extra] = part;
    const declaredType = headerValue(part, 'content-type');
    const type = declaredType ?? getMimeType(filename, 'path');
    const fieldName = typeof extra.name === 'string' ? extra.name : 'file';
    const inline = extra.content;
    const bytes =
      typeof inline === 'string' || inline instanceof Uint8Array ? inline : await readFile(filename);

    form.append(fieldName, new Blob([bytes], { type }), uploadName(filename, declaredType));
  }

  return form;
}

import { describe, it, expect, vi } from 'vitest';
import { toFormData } from '../form-data.js';

async function entry(form: FormData, name: string): Promise<Blob> {
  const value = form.get(name);
  if (!(value instanceof Blob)) throw new Error(`expected ${name} to be a file entry`);
  return value;
}

describe('toFormData', () => {
  it('appends field parts as strings', async () => {
    const form = await toFormData([['title', 'Report'], ['owner', 'ops']]);
    expect(form.get('title')).toBe('Report');
    expect(form.get('owner')).toBe('ops');
  });

  it('uses inline content, the field name from extra and the declared type', async () => {
    const form = await toFormData([
      ['file', 'notes.txt', { name: 'upload', content: 'hello' }, [['Content-Type', 'text/markdown']]],
    ]);
    const file = await entry(form, 'upload');
    expect(await file.text()).toBe('hello');
    expect(file.type).toBe('text/markdown');
    expect(file).toHaveProperty('name', 'notes.txt');
  });

  it('reads the file when no content is given and types it from the file name', async () => {
    const readFile = vi.fn(async (_path: string) => new Uint8Array([1, 2, 3]));
    const form = await toFormData([['file', '/tmp/uploads/image.png', {}, []]], { readFile });
    expect(readFile).toHaveBeenCalledWith('/tmp/uploads/image.png');
    const file = await entry(form, 'file');
    expect(file.type).toBe('image/png');
    expect(file.size).toBe(3);
    expect(file).toHaveProperty('name', 'image.png');
  });

  it('borrows an extension from the declared type for bare file names', async () => {
    const form = await toFormData([['file', 'exports/latest', { content: 'a,b' }, [['content-type', 'text/csv']]]]);
    expect(await entry(form, 'file')).toHaveProperty('name', 'latest.csv');
  });
});

import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { basename } from 'path';

import type { UploadOptions } from './types';

/** A local file read into memory for a multipart request */
export interface OpenedFile {
  fileName: string;
  blob: Blob;
}

/**
 * Open `paths` read-only, hand their contents to `fn`, and close every handle
 * once `fn` settles. Handles already opened are closed if a later open fails.
 */
export async function withOpenFiles<T>(
  paths: readonly string[],
  fn: (files: OpenedFile[]) => Promise<T>,
): Promise<T> {
  const handles: FileHandle[] = [];

  try {
    const files: OpenedFile[] = [];
    for (const filePath of paths) {
      const handle = await fs.open(filePath, 'r');
      handles.push(handle);
      files.push({ fileName: basename(filePath), blob: new Blob([await handle.readFile()]) });
    }
    return await fn(files);
  } finally {
    await Promise.all(handles.map((handle) => handle.close()));
  }
}

/**
 * Build a multipart body: every file under `field`, then the metadata fields.
 * `name` is only sent when non-empty; the others whenever they are defined.
 */
export function buildUploadForm(
  field: 'file' | 'files',
  files: readonly OpenedFile[],
  options: UploadOptions = {},
): FormData {
  const form = new FormData();

  for (const file of files) {
    form.append(field, file.blob, file.fileName);
  }

  if (options.name) {
    form.append('name', options.name);
  }
  if (options.compression !== undefined) {
    form.append('compression', options.compression);
  }
  if (options.folderId !== undefined) {
    form.append('folderId', options.folderId);
  }

  return form;
}

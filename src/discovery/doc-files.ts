/**
 * Documentation file discovery.
 *
 * The docs directory holds one level of category subdirectories, each with
 * `.md` files:
 *
 *   Documentation/
 *     math/abs.md
 *     math/clip.md
 *     signal/osc~.md
 *
 * Files directly under the docs directory, deeper nesting and non-`.md`
 * entries are ignored. Symlinks are followed, both for category directories
 * and for files. Entries are visited in sorted order so output is stable
 * across filesystems.
 */

import type { Dirent } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';

import { debug } from '../shared/debug.js';
import { DocsDirectoryError, errorMessage } from '../shared/errors.js';

export const DOC_EXTENSION = '.md';

export interface DocFile {
  /** Absolute (or docsDir-relative) path used for reading. */
  path: string;
  /** `category/file.md`, used in error messages. */
  relativePath: string;
  /** File text with CRLF normalized to LF. */
  content: string;
}

function byName(a: Dirent, b: Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

type EntryKind = 'directory' | 'file' | 'other';

/**
 * Classifies a directory entry, looking through symlinks to their target.
 * A dangling link is reported as 'other'.
 */
async function entryKind(dir: string, entry: Dirent): Promise<EntryKind> {
  if (entry.isSymbolicLink()) {
    const path = join(dir, entry.name);
    try {
      const target = await stat(path);
      return target.isDirectory() ? 'directory' : target.isFile() ? 'file' : 'other';
    } catch (err) {
      debug('discover', 'Skipping unreadable symlink', { path, error: errorMessage(err) });
      return 'other';
    }
  }
  return entry.isDirectory() ? 'directory' : entry.isFile() ? 'file' : 'other';
}

/**
 * Lists the documentation files under `docsDir` without reading them.
 */
export async function listDocFiles(docsDir: string): Promise<Omit<DocFile, 'content'>[]> {
  let topLevel: Dirent[];
  try {
    topLevel = await readdir(docsDir, { withFileTypes: true });
  } catch (err) {
    throw new DocsDirectoryError(docsDir, errorMessage(err));
  }

  const files: Omit<DocFile, 'content'>[] = [];
  for (const category of topLevel.sort(byName)) {
    if ((await entryKind(docsDir, category)) !== 'directory') {
      continue;
    }
    const categoryPath = join(docsDir, category.name);
    const entries = await readdir(categoryPath, { withFileTypes: true });
    for (const entry of entries.sort(byName)) {
      if (!entry.name.endsWith(DOC_EXTENSION)) {
        continue;
      }
      if ((await entryKind(categoryPath, entry)) === 'file') {
        files.push({
          path: join(categoryPath, entry.name),
          relativePath: `${category.name}/${entry.name}`,
        });
      }
    }
  }
  return files;
}

/**
 * Lists and reads every documentation file under `docsDir`.
 * All files are read before any parsing starts.
 */
export async function discoverDocFiles(docsDir: string): Promise<DocFile[]> {
  const listed = await listDocFiles(docsDir);
  const files: DocFile[] = [];
  for (const file of listed) {
    const content = await readFile(file.path, 'utf-8');
    files.push({ ...file, content: normalizeNewlines(content) });
  }
  debug('discover', 'Discovered documentation files', { docsDir, files: files.length });
  return files;
}

/**
 * Image directory scanning - builds the session's work list.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ImageEntry } from '../core/session/SessionPorts';
import { IMAGE_EXTENSIONS } from '../config/FileConfig';
import { Logger } from '../utils/Logger';

const log = new Logger('ImageDirectory');

/** Describe a file as a work-list entry; the identity is the name without extension. */
export function toImageEntry(filePath: string): ImageEntry {
  const fileName = path.basename(filePath);
  const extension = path.extname(fileName);
  return {
    path: filePath,
    fileName,
    identity: extension.length > 0 ? fileName.slice(0, -extension.length) : fileName,
  };
}

export function isImageFileName(fileName: string): boolean {
  return IMAGE_EXTENSIONS.includes(path.extname(fileName).toLowerCase());
}

/**
 * List the images directly inside `dir` (no recursion), sorted by file name
 * so the order, and with it `--start-index`, is stable between runs.
 * Sub-directories and files with other extensions are left out.
 *
 * Masks and ledger lines are keyed by identity, so of several files sharing
 * one (`a.jpg` and `a.png`) only the first in name order is listed.
 */
export async function listImageEntries(dir: string): Promise<ImageEntry[]> {
  const dirents = await fs.promises.readdir(dir, { withFileTypes: true });
  const names = dirents
    .filter((dirent) => !dirent.isDirectory() && isImageFileName(dirent.name))
    .map((dirent) => dirent.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

  const byIdentity = new Map<string, ImageEntry>();
  for (const name of names) {
    const entry = toImageEntry(path.join(dir, name));
    const first = byIdentity.get(entry.identity);
    if (first) {
      log.warn(`Skipping ${entry.fileName}: identity "${entry.identity}" is already used by ${first.fileName}`);
      continue;
    }
    byIdentity.set(entry.identity, entry);
  }
  return Array.from(byIdentity.values());
}

/**
 * FileSystem Utilities
 * Path helpers, slugs and atomic writes.
 */

import { promises as fsPromises } from 'node:fs';
import * as path from 'node:path';
import { randomBytes } from 'node:crypto';

// ==========================================
// Part 1: Path Helpers
// ==========================================

export const MAX_SLUG_LENGTH = 100;

/**
 * ASCII, lowercase, hyphen-separated path segment. Accents are folded, every
 * other non-alphanumeric run becomes a single hyphen.
 */
export function slugify(value: string, fallback: string = 'untitled'): string {
  const slug = String(value)
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/-+$/g, '');
  return slug || fallback;
}

// ==========================================
// Part 2: Atomic Writes
// ==========================================

/**
 * Writes to a uniquely named sibling and renames it over the target, so readers
 * see either the old file or the complete new one.
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fsPromises.mkdir(dir, { recursive: true });
  const tmpPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`,
  );
  try {
    await fsPromises.writeFile(tmpPath, data, 'utf-8');
    await fsPromises.rename(tmpPath, filePath);
  } catch (error) {
    await fsPromises.rm(tmpPath, { force: true });
    throw error;
  }
}

export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(value, null, 2)}\n`);
}

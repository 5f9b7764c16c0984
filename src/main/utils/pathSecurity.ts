import * as path from 'path';
import * as fs from 'fs/promises';
import { MAX_FILENAME_LENGTH, PLACEHOLDER_FILENAME } from '../../shared/constants/protocol';
import { logger } from './logger';

/**
 * Security utilities for naming files that arrive from the network.
 * Prevents path traversal and overwriting of existing files.
 */

const DISALLOWED_CHARACTERS = /[^\p{L}\p{N}._-]/gu;
const DOTS_ONLY = /^\.+$/;

/**
 * Reduces a peer-supplied filename to a safe basename
 * @param filename - Name as declared by the sender, possibly with directories
 * @returns Non-empty name of at most MAX_FILENAME_LENGTH letters, digits, `.`, `-` or `_`
 */
export function sanitizeFilename(filename: string): string {
  // win32.basename splits on both "/" and "\"
  let safeName = path.win32.basename(filename).replace(DISALLOWED_CHARACTERS, '');

  if (safeName.length === 0 || DOTS_ONLY.test(safeName)) {
    safeName = PLACEHOLDER_FILENAME;
  }

  // Lengths count code points so a surrogate pair is never split.
  const characters = Array.from(safeName);
  if (characters.length > MAX_FILENAME_LENGTH) {
    const ext = path.extname(safeName);
    const extLength = Array.from(ext).length;
    safeName =
      extLength > 0 && extLength < MAX_FILENAME_LENGTH
        ? characters.slice(0, MAX_FILENAME_LENGTH - extLength).join('') + ext
        : characters.slice(0, MAX_FILENAME_LENGTH).join('');
    if (DOTS_ONLY.test(safeName)) {
      safeName = PLACEHOLDER_FILENAME;
    }
  }

  return safeName;
}

/**
 * Sanitizes a file path and ensures it stays within the base directory
 * @param filePath - The file path to sanitize (can be relative or absolute)
 * @param baseDir - The base directory that the path must stay within
 * @returns Sanitized absolute path
 * @throws Error if path traversal is detected
 */
export function sanitizePath(filePath: string, baseDir: string): string {
  const normalizedBase = path.resolve(baseDir);
  const resolved = path.resolve(normalizedBase, path.normalize(filePath));

  if (!resolved.startsWith(normalizedBase + path.sep)) {
    logger.error(
      `Path traversal attempt detected: ${filePath} (resolved: ${resolved}, base: ${normalizedBase})`
    );
    throw new Error(`Path traversal detected: ${filePath}`);
  }

  return resolved;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Finds the first unused destination for a sanitized name: `name.ext`, then
 * `name_1.ext`, `name_2.ext`, ... The lookup is not atomic with file creation, so
 * two sessions delivering the same name at the same moment can pick the same path.
 */
export async function resolveDestination(baseDir: string, safeName: string): Promise<string> {
  const ext = path.extname(safeName);
  const stem = safeName.slice(0, safeName.length - ext.length);

  let candidate = sanitizePath(safeName, baseDir);
  for (let counter = 1; await pathExists(candidate); counter++) {
    candidate = sanitizePath(`${stem}_${counter}${ext}`, baseDir);
  }

  return candidate;
}

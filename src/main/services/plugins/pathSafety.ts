import path from 'node:path';

const MAX_FILE_NAME_LENGTH = 255;
const INVALID_FILE_NAME_CHARS = /[\\/:*?"<>|\x00-\x1f]/;

/** A single path segment: no separators, no traversal, no control characters. */
export function isValidFileName(name: string): boolean {
  return (
    name.length > 0 &&
    name.length <= MAX_FILE_NAME_LENGTH &&
    name !== '.' &&
    name !== '..' &&
    !INVALID_FILE_NAME_CHARS.test(name)
  );
}

/** True only for paths strictly below `rootDir`; the root itself does not count. */
export function isPathInside(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(path.resolve(rootDir), path.resolve(candidatePath));
  return rel !== '' && !rel.startsWith('..') && !path.isAbsolute(rel);
}

import { WheelError } from './errors.js';

/**
 * Why an archive-relative path is unsafe, or `null` when it is fine.
 *
 * Paths are POSIX-style, relative, free of `..`, `.` and empty segments;
 * a single trailing `/` marks a directory.
 */
export function describeUnsafePath(path: string): string | null {
  if (path.length === 0) return 'path is empty';
  if (path.includes('\u0000')) return 'path contains NUL';
  if (path.includes('\\')) return 'path contains a backslash';
  if (path.startsWith('/') || /^[a-zA-Z]:/.test(path)) return 'path is absolute';
  const segments = (path.endsWith('/') ? path.slice(0, -1) : path).split('/');
  if (segments.some((segment) => segment === '..')) return 'path contains a ".." segment';
  if (segments.some((segment) => segment === '.' || segment.length === 0)) return 'path contains an empty or "." segment';
  return null;
}

/** @throws WheelError `WHEEL_INVALID_PATH` */
export function assertSafePath(path: string, line?: number): void {
  const reason = describeUnsafePath(path);
  if (reason !== null) {
    throw new WheelError('WHEEL_INVALID_PATH', `Unsafe archive path ${JSON.stringify(path)}: ${reason}`, {
      entryName: path,
      line
    });
  }
}

export function isDirectoryPath(path: string): boolean {
  return path.endsWith('/');
}

/** Code-unit order, the ordering used for every path listing this package writes. */
export function comparePaths(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

import { InvalidPathError } from './errors.js';

/**
 * Normalize a logical storage path: backslashes become slashes, repeated
 * slashes collapse, leading/trailing slashes and `.` segments are dropped.
 * Any `..` segment is rejected.
 */
export function normalizeLogicalPath(path: string): string {
  const segments = path
    .replace(/\\/g, '/')
    .split('/')
    .filter((segment) => segment.length > 0 && segment !== '.');

  if (segments.includes('..')) {
    throw new InvalidPathError(path);
  }

  return segments.join('/');
}

/**
 * Like normalizeLogicalPath, but the result must name something.
 */
export function requireFilePath(path: string): string {
  const normalized = normalizeLogicalPath(path);
  if (normalized.length === 0) {
    throw new InvalidPathError(path);
  }
  return normalized;
}

/**
 * Join path fragments, ignoring empty ones.
 */
export function joinLogicalPath(...parts: string[]): string {
  return normalizeLogicalPath(parts.filter((part) => part.length > 0).join('/'));
}

/**
 * Parent directory of a normalized path, or '' at the top level.
 */
export function parentOf(path: string): string {
  const index = path.lastIndexOf('/');
  return index === -1 ? '' : path.slice(0, index);
}

/**
 * Every ancestor prefix of a normalized directory path, shallowest first.
 * `a/b/c` yields `a`, `a/b`, `a/b/c`.
 */
export function ancestorsOf(path: string): string[] {
  if (path.length === 0) return [];
  const segments = path.split('/');
  return segments.map((_segment, index) => segments.slice(0, index + 1).join('/'));
}

/**
 * Percent-encode each segment of a path while keeping the separators.
 */
export function encodePathSegments(path: string): string {
  return path
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}

/**
 * Convert an identifier to a filesystem-safe slug: lowercase, punctuation
 * dropped, runs of whitespace/hyphens turned into a single underscore.
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\w\s-]/g, '')
    .replace(/[-\s]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

import slugify from 'slugify';

const UNSAFE_PATH_CHARS = /[<>:"/\\|?*]/g;

/**
 * Filesystem-safe folder name: path-unsafe characters dropped, whitespace
 * runs collapsed to a single underscore, case preserved.
 */
export function toFolderName(
  value: string | null | undefined,
  fallback: string,
): string {
  if (!value) return fallback;

  const base = slugify(value.replace(UNSAFE_PATH_CHARS, ''), {
    replacement: '_',
    remove: UNSAFE_PATH_CHARS,
    lower: false,
    strict: false,
    trim: true,
  })
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');

  return base || fallback;
}

/** Replaces path-unsafe characters in a file name, keeping its extension. */
export function sanitizeFileName(fileName: string): string {
  return fileName.replace(UNSAFE_PATH_CHARS, '_').replace(/_+/g, '_');
}

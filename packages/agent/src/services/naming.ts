const VERSION_MARKER = '_v';
const PROGRAM_EXTENSION = '.nc';

/**
 * Directory/file-safe form of a project or part name. Archives written by
 * earlier runs depend on this exact mapping.
 */
export function sanitizeName(name: string): string {
  return name
    .replace(/[^\p{L}\p{N}_]/gu, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
}

/** `{part}_v{version}_{posted}.nc`; `posted` is used verbatim. */
export function versionFileName(part: string, version: number, postedTimestamp: string): string {
  return `${sanitizeName(part)}${VERSION_MARKER}${version}_${postedTimestamp}${PROGRAM_EXTENSION}`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function versionFilePattern(part: string): RegExp {
  return new RegExp(`^${escapeRegExp(sanitizeName(part))}${VERSION_MARKER}(\\d+)_.+\\${PROGRAM_EXTENSION}$`);
}

/** Version number encoded in an archived file name for `part`, or null when it is not one of its files. */
export function parseVersionNumber(fileName: string, part: string): number | null {
  const match = versionFilePattern(part).exec(fileName);
  if (!match) return null;
  const version = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(version) && version > 0 ? version : null;
}

export function isProgramFileName(fileName: string): boolean {
  return fileName.toLowerCase().endsWith(PROGRAM_EXTENSION);
}

/** Retention grouping key: the file stem up to the first `_v`. */
export function publishedPartKey(fileName: string): string {
  const stem = isProgramFileName(fileName) ? fileName.slice(0, -PROGRAM_EXTENSION.length) : fileName;
  const idx = stem.indexOf(VERSION_MARKER);
  return idx >= 0 ? stem.slice(0, idx) : stem;
}

import { promises as fsp } from 'fs';
import { basename } from 'path';
import { err, ok, Result, ResultAsync } from 'neverthrow';
import {
  METADATA_END,
  METADATA_START,
  REQUIRED_METADATA_KEYS,
  type MetadataError,
  type ProgramMetadata
} from '../../../shared/src';
import { logger } from '../logger';
import { toAppError } from '../errors';
import { sanitizeName } from './naming';

const COMMENT_PATTERN = /\(([^)]+)\)/;
const PROGRAM_NUMBER_PATTERN = /^O(\d+)/;
const COUNT_PATTERN = /^\+?\d+$/;
const POSTED_PATTERN = /^(\d{4})-(\d{2})-(\d{2})-(\d{2})(\d{2})$/;
const PATH_SEPARATOR_PATTERN = /[\\/\0]/;

const UNKNOWN = 'unknown';

type HeaderScan = {
  fields: Map<string, string>;
  programNumber?: string;
};

function scanHeader(content: string): HeaderScan {
  const fields = new Map<string, string>();
  let programNumber: string | undefined;
  let inBlock = false;

  for (const raw of content.split('\n')) {
    const line = raw.trim();

    if (!inBlock && programNumber === undefined) {
      const match = PROGRAM_NUMBER_PATTERN.exec(line);
      if (match) programNumber = match[1];
    }

    if (line.includes(METADATA_START)) {
      inBlock = true;
      continue;
    }
    if (line.includes(METADATA_END)) break;
    if (!inBlock) continue;

    const comment = COMMENT_PATTERN.exec(line)?.[1];
    if (!comment) continue;
    const colon = comment.indexOf(':');
    if (colon < 0) continue;
    const key = comment.slice(0, colon).trim().toLowerCase().replace(/-/g, '_');
    fields.set(key, comment.slice(colon + 1).trim());
  }

  return { fields, programNumber };
}

function parseCount(fields: Map<string, string>, key: string): Result<number, MetadataError> {
  const raw = fields.get(key);
  if (raw === undefined) return ok(0);
  if (!COUNT_PATTERN.test(raw)) {
    return err<number, MetadataError>({
      code: 'metadata.invalidNumber',
      message: `Header field ${key} is not a whole number: "${raw}"`,
      details: { field: key, value: raw }
    });
  }
  return ok(Number.parseInt(raw, 10));
}

/**
 * Reads the CHIP-WARDEN header block out of a program. Absent required
 * fields and unusable values are reported with distinct error codes.
 */
export function parseMetadata(content: string): Result<ProgramMetadata, MetadataError> {
  const { fields, programNumber } = scanHeader(content);

  const missing = REQUIRED_METADATA_KEYS.filter((key) => !fields.get(key));
  if (missing.length > 0) {
    return err<ProgramMetadata, MetadataError>({
      code: 'metadata.missingFields',
      message: `Missing required header fields: ${missing.join(', ')}`,
      details: { missing }
    });
  }

  const project = fields.get('project') ?? '';
  const part = fields.get('part') ?? '';
  if (!sanitizeName(project) || !sanitizeName(part)) {
    return err<ProgramMetadata, MetadataError>({
      code: 'metadata.unsafeName',
      message: 'Project or part name has no usable characters',
      details: { project, part }
    });
  }

  // posted goes verbatim into archive and share file names
  const posted = fields.get('posted') ?? '';
  if (PATH_SEPARATOR_PATTERN.test(posted) || posted === '.' || posted === '..') {
    return err<ProgramMetadata, MetadataError>({
      code: 'metadata.unsafeName',
      message: `Posted timestamp cannot be used in a file name: "${posted}"`,
      details: { posted }
    });
  }

  return Result.combine([parseCount(fields, 'operations'), parseCount(fields, 'tool_count')]).map(
    ([operations, toolCount]): ProgramMetadata => ({
      project,
      part,
      postedTimestamp: posted,
      operations,
      toolCount,
      machine: fields.get('machine') || UNKNOWN,
      setup: fields.get('setup') || UNKNOWN,
      ...(programNumber !== undefined ? { programNumber } : {})
    })
  );
}

/** Same as {@link parseMetadata}, with the failure logged and collapsed to null. */
export function extractMetadata(content: string, source?: string): ProgramMetadata | null {
  return parseMetadata(content).match(
    (metadata) => metadata,
    (error) => {
      logger.warn({ source, code: error.code, details: error.details }, `metadata: ${error.message}`);
      return null;
    }
  );
}

export async function readMetadataFile(path: string): Promise<ProgramMetadata | null> {
  const read = await ResultAsync.fromPromise(fsp.readFile(path, 'utf8'), toAppError);
  if (read.isErr()) {
    logger.warn({ file: path, code: read.error.code, details: read.error.details }, 'metadata: failed to read program file');
    return null;
  }
  return extractMetadata(read.value, basename(path));
}

/** Posted timestamp as a local calendar date, or null when it is not a real `YYYY-MM-DD-HHMM` value. */
export function postedDate(metadata: Pick<ProgramMetadata, 'postedTimestamp'>): Date | null {
  const match = POSTED_PATTERN.exec(metadata.postedTimestamp.trim());
  if (!match) return null;
  const [year, month, day, hour, minute] = match.slice(1).map((part) => Number.parseInt(part, 10));
  const date = new Date(year, month - 1, day, hour, minute);
  const roundTrips =
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day &&
    date.getHours() === hour &&
    date.getMinutes() === minute;
  return roundTrips ? date : null;
}

/** `YYYY-MM-DD HH:MM:00`, falling back to the raw posted string. */
export function formatPosted(metadata: Pick<ProgramMetadata, 'postedTimestamp'>): string {
  const date = postedDate(metadata);
  if (!date) return metadata.postedTimestamp;
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:00`;
}

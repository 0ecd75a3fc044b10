import { promises as fsp } from 'fs';
import { join } from 'path';
import type { ProgramMetadata } from '../../../shared/src';
import { hasErrnoCode } from '../errors';
import { logger } from '../logger';
import { isProgramFileName, publishedPartKey, versionFileName } from './naming';

const { copyFile, mkdir, readdir, stat } = fsp;

export const DEFAULT_KEEP_COUNT = 2;

type PublishedFile = {
  name: string;
  path: string;
  mtimeMs: number;
};

/**
 * Copies archived programs onto the machine share and keeps at most
 * `keepCount` copies per part there.
 */
export class Publisher {
  constructor(readonly publishDir: string) {}

  async publish(archivedPath: string, metadata: ProgramMetadata, version: number): Promise<string> {
    await mkdir(this.publishDir, { recursive: true });
    const target = join(this.publishDir, versionFileName(metadata.part, version, metadata.postedTimestamp));
    await copyFile(archivedPath, target);
    logger.info({ target, version }, 'publish: copied to share');
    return target;
  }

  async listPublished(): Promise<PublishedFile[]> {
    let entries: string[];
    try {
      entries = await readdir(this.publishDir);
    } catch (err) {
      if (hasErrnoCode(err, 'ENOENT')) return [];
      throw err;
    }
    const files: PublishedFile[] = [];
    for (const name of entries) {
      if (!isProgramFileName(name)) continue;
      const path = join(this.publishDir, name);
      try {
        const info = await stat(path);
        if (info.isFile()) files.push({ name, path, mtimeMs: info.mtimeMs });
      } catch (err) {
        logger.warn({ err, path }, 'publish: failed to stat published file');
      }
    }
    return files;
  }

  /** Deletes all but the newest `keepCount` copies of each part. Returns how many were removed. */
  async prune(keepCount = DEFAULT_KEEP_COUNT): Promise<number> {
    const keep = Math.max(0, Math.trunc(Number.isFinite(keepCount) ? keepCount : DEFAULT_KEEP_COUNT));
    const groups = new Map<string, PublishedFile[]>();
    for (const file of await this.listPublished()) {
      const key = publishedPartKey(file.name);
      const group = groups.get(key);
      if (group) group.push(file);
      else groups.set(key, [file]);
    }

    let removed = 0;
    for (const [partKey, files] of groups) {
      files.sort((a, b) => b.mtimeMs - a.mtimeMs || b.name.localeCompare(a.name));
      for (const stale of files.slice(keep)) {
        try {
          await fsp.unlink(stale.path);
          removed += 1;
          logger.info({ file: stale.name, partKey }, 'publish: removed old copy');
        } catch (err) {
          logger.warn({ err, file: stale.name, partKey }, 'publish: failed to remove old copy');
        }
      }
    }

    if (removed > 0) {
      logger.info({ removed, keep }, 'publish: retention sweep complete');
    }
    return removed;
  }
}

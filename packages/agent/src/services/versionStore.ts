import { constants as fsConstants, promises as fsp } from 'fs';
import { join, relative, sep } from 'path';
import type { ProgramMetadata } from '../../../shared/src';
import { hasErrnoCode } from '../errors';
import { logger } from '../logger';
import { CHANGELOG_FILE, parseEntries, prependEntry, splitChangelog, type ChangelogEntry } from './changelog';
import { parseVersionNumber, sanitizeName, versionFileName } from './naming';
import type { VersionControl } from './versionControl';

const { copyFile, mkdir, readdir, readFile, stat, utimes, writeFile } = fsp;

export type ArchivedVersion = {
  version: number;
  path: string;
  fileName: string;
  mtimeMs: number;
};

export type ArchiveResult = {
  path: string;
  version: number;
  committed: boolean;
};

export type VersionStoreOptions = {
  archiveRoot: string;
  versionControl: VersionControl;
  commitOnArchive?: boolean;
};

export type PartLocation = {
  /** Sanitized project directory name. */
  project: string;
  partDir: string;
};

function toPosix(path: string): string {
  return path.split(sep).join('/');
}

function highestVersion(versions: ArchivedVersion[]): number {
  return versions.reduce((max, entry) => Math.max(max, entry.version), 0);
}

/** Count of archived versions plus one, or past the highest when that number is already used. */
function nextVersion(versions: ArchivedVersion[]): number {
  const candidate = versions.length + 1;
  return versions.some((entry) => entry.version === candidate) ? highestVersion(versions) + 1 : candidate;
}

export function buildCommitMessage(metadata: ProgramMetadata, version: number): string {
  return [
    `${metadata.part} v${version} - ${metadata.setup}`,
    '',
    `Project: ${metadata.project}`,
    `Machine: ${metadata.machine}`,
    `Operations: ${metadata.operations}`,
    `Tools: ${metadata.toolCount}`,
    `Posted: ${metadata.postedTimestamp}`
  ].join('\n');
}

/**
 * Append-only archive laid out as `root/{project}/{part}/`, one versioned copy
 * per posted program plus a newest-first CHANGELOG.md. Assumes a single
 * writer per archive root.
 */
export class VersionStore {
  private repositoryReady = false;

  private constructor(
    readonly archiveRoot: string,
    private readonly versionControl: VersionControl,
    private readonly commitOnArchive: boolean
  ) {}

  static async open(options: VersionStoreOptions): Promise<VersionStore> {
    const store = new VersionStore(options.archiveRoot, options.versionControl, options.commitOnArchive ?? true);
    await mkdir(options.archiveRoot, { recursive: true });
    try {
      await options.versionControl.initRepository(options.archiveRoot);
      store.repositoryReady = true;
    } catch (err) {
      logger.error({ err, archiveRoot: options.archiveRoot }, 'archive: version control init failed; commits disabled');
    }
    return store;
  }

  partDirectory(project: string, part: string): string {
    return join(this.archiveRoot, sanitizeName(project), sanitizeName(part));
  }

  async ensurePartDirectory(project: string, part: string): Promise<string> {
    const dir = this.partDirectory(project, part);
    await mkdir(dir, { recursive: true });
    return dir;
  }

  /** Archived versions of a part, newest first by modification time. */
  async listVersions(project: string, part: string): Promise<ArchivedVersion[]> {
    const dir = this.partDirectory(project, part);
    let entries: string[];
    try {
      entries = await readdir(dir);
    } catch (err) {
      if (hasErrnoCode(err, 'ENOENT')) return [];
      throw err;
    }
    const versions: ArchivedVersion[] = [];
    for (const fileName of entries) {
      const version = parseVersionNumber(fileName, part);
      if (version === null) continue;
      const path = join(dir, fileName);
      const info = await stat(path);
      if (!info.isFile()) continue;
      versions.push({ version, path, fileName, mtimeMs: info.mtimeMs });
    }
    return versions.sort((a, b) => b.mtimeMs - a.mtimeMs || b.version - a.version);
  }

  async latestVersion(project: string, part: string): Promise<ArchivedVersion | null> {
    const versions = await this.listVersions(project, part);
    return versions[0] ?? null;
  }

  async nextVersionNumber(project: string, part: string): Promise<number> {
    return nextVersion(await this.listVersions(project, part));
  }

  async archive(sourceFile: string, metadata: ProgramMetadata): Promise<ArchiveResult> {
    const dir = await this.ensurePartDirectory(metadata.project, metadata.part);
    const existing = await this.listVersions(metadata.project, metadata.part);
    const highest = highestVersion(existing);
    let version = nextVersion(existing);
    if (version !== existing.length + 1) {
      logger.warn({ count: existing.length, version }, 'archive: version number already used; advancing past highest version');
    }
    let dest = join(dir, versionFileName(metadata.part, version, metadata.postedTimestamp));

    try {
      await copyFile(sourceFile, dest, fsConstants.COPYFILE_EXCL);
    } catch (err) {
      if (!hasErrnoCode(err, 'EEXIST')) throw err;
      const taken = dest;
      version = Math.max(highest, version) + 1;
      dest = join(dir, versionFileName(metadata.part, version, metadata.postedTimestamp));
      logger.warn({ taken, version }, 'archive: version file name already taken; advancing past highest version');
      await copyFile(sourceFile, dest, fsConstants.COPYFILE_EXCL);
    }

    const source = await stat(sourceFile);
    await utimes(dest, source.atime, source.mtime);
    logger.info({ dest, version }, 'archive: program archived');

    const changelogPath = await this.updateChangelog(dir, metadata, version);

    let committed = false;
    if (this.commitOnArchive && this.repositoryReady) {
      committed = await this.versionControl.stageAndCommit(
        this.archiveRoot,
        [toPosix(relative(this.archiveRoot, dest)), toPosix(relative(this.archiveRoot, changelogPath))],
        buildCommitMessage(metadata, version)
      );
    }

    return { path: dest, version, committed };
  }

  private async updateChangelog(dir: string, metadata: ProgramMetadata, version: number): Promise<string> {
    const changelogPath = join(dir, CHANGELOG_FILE);
    let existing: string | null = null;
    try {
      existing = await readFile(changelogPath, 'utf8');
    } catch (err) {
      if (!hasErrnoCode(err, 'ENOENT')) throw err;
    }
    await writeFile(changelogPath, prependEntry(existing, metadata, version), 'utf8');
    logger.debug({ changelogPath, version }, 'archive: changelog updated');
    return changelogPath;
  }

  async readChangelog(project: string, part: string): Promise<{ header: string; entries: ChangelogEntry[] } | null> {
    const changelogPath = join(this.partDirectory(project, part), CHANGELOG_FILE);
    let text: string;
    try {
      text = await readFile(changelogPath, 'utf8');
    } catch (err) {
      if (hasErrnoCode(err, 'ENOENT')) return null;
      throw err;
    }
    return { header: splitChangelog(text).header, entries: parseEntries(text) };
  }

  async listProjects(): Promise<string[]> {
    try {
      const entries = await readdir(this.archiveRoot, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
        .map((entry) => entry.name)
        .sort();
    } catch (err) {
      if (hasErrnoCode(err, 'ENOENT')) return [];
      throw err;
    }
  }

  /** Every project that holds a directory for `part`. */
  async findPart(part: string): Promise<PartLocation[]> {
    const safePart = sanitizeName(part);
    if (!safePart) return [];
    const found: PartLocation[] = [];
    for (const project of await this.listProjects()) {
      const partDir = join(this.archiveRoot, project, safePart);
      try {
        if ((await stat(partDir)).isDirectory()) found.push({ project, partDir });
      } catch (err) {
        if (!hasErrnoCode(err, 'ENOENT')) throw err;
      }
    }
    return found;
  }
}

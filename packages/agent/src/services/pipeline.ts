import { promises as fsp } from 'fs';
import { basename } from 'path';
import { ResultAsync } from 'neverthrow';
import type { AppError, ChangeReport, ProgramMetadata } from '../../../shared/src';
import { logger } from '../logger';
import { errorMessage, toAppError } from '../errors';
import { compareMetadata, warningLines } from './changeDetector';
import { extractMetadata, readMetadataFile } from './metadata';
import type { Notifier } from './notifications';
import type { Publisher } from './publisher';
import type { VersionStore } from './versionStore';

export type ProcessOutcome =
  | { status: 'skipped'; reason: 'unreadable' | 'no-metadata' }
  | {
      status: 'processed';
      metadata: ProgramMetadata;
      version: number;
      archivedPath: string;
      publishedPath: string;
      committed: boolean;
      removed: number;
      report: ChangeReport | null;
    }
  | { status: 'failed'; error: AppError };

export type PipelineOptions = {
  store: VersionStore;
  publisher: Publisher;
  notifier?: Notifier | null;
  keepCount: number;
  notifyOnPost?: boolean;
};

/**
 * Runs one posted program through extract → compare → archive → publish →
 * prune → notify, then removes the source. The source is only removed when
 * every step succeeded.
 */
export class ProgramPipeline {
  constructor(private readonly options: PipelineOptions) {}

  private async previousMetadata(metadata: ProgramMetadata): Promise<ProgramMetadata | null> {
    const latest = await this.options.store.latestVersion(metadata.project, metadata.part);
    if (!latest) return null;
    return readMetadataFile(latest.path);
  }

  async process(filePath: string): Promise<ProcessOutcome> {
    const fileName = basename(filePath);
    const read = await ResultAsync.fromPromise(fsp.readFile(filePath, 'utf8'), toAppError);
    if (read.isErr()) {
      logger.warn({ file: filePath, code: read.error.code }, 'pipeline: could not read program; left in place');
      return { status: 'skipped', reason: 'unreadable' };
    }

    const metadata = extractMetadata(read.value, fileName);
    if (!metadata) {
      logger.warn({ file: fileName }, 'pipeline: no Chip Warden metadata; file not processed. Is the post processor modified?');
      return { status: 'skipped', reason: 'no-metadata' };
    }

    try {
      logger.info(
        {
          file: fileName,
          project: metadata.project,
          part: metadata.part,
          setup: metadata.setup,
          machine: metadata.machine,
          toolCount: metadata.toolCount,
          operations: metadata.operations
        },
        'pipeline: metadata parsed'
      );

      const previous = await this.previousMetadata(metadata);
      const report = previous ? compareMetadata(previous, metadata) : null;
      for (const warning of report?.warnings ?? []) {
        logger.warn({ part: metadata.part, field: warning.field, severity: warning.severity }, warning.message);
      }

      const archived = await this.options.store.archive(filePath, metadata);
      const publishedPath = await this.options.publisher.publish(archived.path, metadata, archived.version);
      const removed = await this.options.publisher.prune(this.options.keepCount);

      if (this.options.notifier && (this.options.notifyOnPost ?? true)) {
        const lines = report ? warningLines(report) : [];
        this.options.notifier.notify('program.archived', {
          project: metadata.project,
          part: metadata.part,
          version: archived.version,
          setup: metadata.setup,
          machine: metadata.machine,
          toolCount: metadata.toolCount,
          warningBlock: lines.length ? `\n\nWarnings:\n${lines.map((line) => `  • ${line}`).join('\n')}` : ''
        });
      }

      await fsp.unlink(filePath);
      logger.info({ file: fileName, part: metadata.part, version: archived.version }, 'pipeline: processed and removed source');

      return {
        status: 'processed',
        metadata,
        version: archived.version,
        archivedPath: archived.path,
        publishedPath,
        committed: archived.committed,
        removed,
        report
      };
    } catch (err) {
      const error = toAppError(err);
      logger.error({ err, file: filePath, code: error.code }, 'pipeline: failed to process program; source kept');
      this.options.notifier?.notify('program.failed', { fileName, error: errorMessage(err) });
      return { status: 'failed', error };
    }
  }
}

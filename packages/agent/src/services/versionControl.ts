import fs, { existsSync } from 'fs';
import { join } from 'path';
import * as git from 'isomorphic-git';
import { logger } from '../logger';

export interface VersionControl {
  /** Creates the repository when it is missing; a no-op otherwise. */
  initRepository(root: string): Promise<void>;
  /** Stages `relativePaths` (posix, relative to `root`) and commits them. Resolves false on failure. */
  stageAndCommit(root: string, relativePaths: string[], message: string): Promise<boolean>;
}

export type GitAuthor = {
  name: string;
  email: string;
};

export class IsomorphicGitVersionControl implements VersionControl {
  constructor(private readonly author: GitAuthor) {}

  async initRepository(root: string): Promise<void> {
    if (existsSync(join(root, '.git'))) return;
    await git.init({ fs, dir: root, defaultBranch: 'main' });
    logger.info({ root }, 'git: initialized archive repository');
  }

  async stageAndCommit(root: string, relativePaths: string[], message: string): Promise<boolean> {
    try {
      for (const filepath of relativePaths) {
        await git.add({ fs, dir: root, filepath });
      }
      const oid = await git.commit({
        fs,
        dir: root,
        message,
        author: { name: this.author.name, email: this.author.email }
      });
      logger.info({ root, oid, files: relativePaths }, 'git: commit created');
      return true;
    } catch (err) {
      logger.warn({ err, root, files: relativePaths }, 'git: commit failed');
      return false;
    }
  }
}

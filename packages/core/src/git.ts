import { injectable, inject } from 'inversify';
import * as fs from 'fs';
import * as path from 'path';
import simpleGit, { CheckRepoActions } from 'simple-git';
import type { SimpleGit } from 'simple-git';
import type { ExportConfig } from './types';

export interface IGitService {
  initIfNeeded(): Promise<void>;
  /** Commits the given paths (relative to the output root) when they changed. */
  commitSnapshot(paths: string[], message: string): Promise<boolean>;
  isGitRepo(): Promise<boolean>;
}

/** Keeps the output root under version control so exports diff cleanly. */
@injectable()
export class GitService implements IGitService {
  private git?: SimpleGit;

  constructor(@inject('config') private config: Pick<ExportConfig, 'outRoot'>) {}

  async initIfNeeded(): Promise<void> {
    const git = await this.client();
    const isRepo = await git.checkIsRepo(CheckRepoActions.IS_REPO_ROOT);
    if (!isRepo) {
      await git.init();
    }
  }

  async commitSnapshot(paths: string[], message: string): Promise<boolean> {
    await this.initIfNeeded();
    const git = await this.client();

    const existing = paths.filter(p => fs.existsSync(path.join(this.config.outRoot, p)));
    if (existing.length === 0) return false;
    await git.add(existing);

    const status = await git.status();
    const staged = status.files.filter(file => file.index !== ' ' && file.index !== '?');
    if (staged.length === 0) return false;
    await git.commit(message);
    return true;
  }

  async isGitRepo(): Promise<boolean> {
    const git = await this.client();
    return await git.checkIsRepo(CheckRepoActions.IS_REPO_ROOT);
  }

  private async client(): Promise<SimpleGit> {
    if (!this.git) {
      // simple-git refuses a base directory that does not exist yet.
      await fs.promises.mkdir(this.config.outRoot, { recursive: true });
      this.git = simpleGit(this.config.outRoot);
    }
    return this.git;
  }
}

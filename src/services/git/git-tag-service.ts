/**
 * Git lifecycle tags
 *
 * Marks sealed and superseded artifacts with annotated tags named
 * `<prefix>/<ID>/<status>`, so the commit that carried a decision can be
 * found later.
 */

import { simpleGit, SimpleGit } from 'simple-git';
import type { ArtifactStatus } from '../../models/types.js';
import { errorMessage } from '../../core/errors.js';
import { logger } from '../../core/logger.js';

export interface GitTagOptions {
  /** Only tag when enabled (config `git.tagOnSeal`) */
  enabled: boolean;
  tagPrefix: string;
}

export class GitTagService {
  private readonly basePath: string;
  private git: SimpleGit | null = null;

  constructor(basePath: string = '.') {
    this.basePath = basePath;
  }

  private getGit(): SimpleGit {
    if (!this.git) {
      this.git = simpleGit(this.basePath);
    }
    return this.git;
  }

  static tagName(prefix: string, artifactId: string, status: ArtifactStatus): string {
    return `${prefix}/${artifactId}/${status}`;
  }

  async isGitRepository(): Promise<boolean> {
    try {
      return await this.getGit().checkIsRepo();
    } catch (error) {
      logger.debug('git unavailable', { error: errorMessage(error) });
      return false;
    }
  }

  /**
   * Creates the lifecycle tag for an artifact entering `status`.
   *
   * Tagging never blocks the lifecycle change: outside a repository, or
   * when git refuses (no commits yet), a warning is logged instead.
   *
   * @returns The tag name, or null when no tag was created
   */
  async tagLifecycle(
    artifactId: string,
    status: ArtifactStatus,
    options: GitTagOptions
  ): Promise<string | null> {
    if (!options.enabled) {
      return null;
    }

    if (!await this.isGitRepository()) {
      logger.warn(`Not tagging ${artifactId}: ${this.basePath} is not a git repository`);
      return null;
    }

    const name = GitTagService.tagName(options.tagPrefix, artifactId, status);
    try {
      const existing = await this.getGit().tags();
      if (existing.all.includes(name)) {
        return name;
      }
      await this.getGit().addAnnotatedTag(name, `${artifactId} ${status}`);
      logger.info(`Tagged ${name}`);
      return name;
    } catch (error) {
      logger.warn(`Could not create tag ${name}: ${errorMessage(error)}`);
      return null;
    }
  }
}

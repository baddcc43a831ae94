import { simpleGit } from 'simple-git';
import type { Logger } from '../logging/logger.js';

/**
 * Reads the revision a run is building, for reports.
 */
export class RevisionReader {
  constructor(
    private readonly workingDirectory: string,
    private readonly logger: Logger,
  ) {}

  /**
   * HEAD commit SHA, or undefined when the working directory is not a git
   * repository, has no commits yet, or git is unavailable.
   */
  async head(): Promise<string | undefined> {
    try {
      const git = simpleGit(this.workingDirectory);
      if (!(await git.checkIsRepo())) {
        this.logger.debug(`${this.workingDirectory} is not a git repository; no revision recorded`);
        return undefined;
      }
      return (await git.revparse(['HEAD'])).trim();
    } catch (err) {
      this.logger.debug(`Could not resolve HEAD: ${err instanceof Error ? err.message : String(err)}`);
      return undefined;
    }
  }
}

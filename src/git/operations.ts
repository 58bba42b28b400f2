import { simpleGit } from "simple-git";

/** The slice of simple-git these operations use. */
export type GitBackend = {
  revparse(args: string[]): Promise<string>;
  push(remote: string, branch: string): Promise<unknown>;
};

/**
 * Thin wrapper over the simple-git calls a run needs.
 */
export class GitOperations {
  private git: GitBackend;

  constructor(repoPath: string, git?: GitBackend) {
    this.git = git ?? simpleGit(repoPath);
  }

  /** Get the full SHA a ref points at (defaults to HEAD). */
  async getCurrentSha(ref = "HEAD"): Promise<string> {
    const result = await this.git.revparse([ref]);
    return result.trim();
  }

  /** Push a local branch to a remote. */
  async push(remote: string, branch: string): Promise<void> {
    await this.git.push(remote, branch);
  }
}

import fs from "node:fs";
import path from "node:path";
import { CheckRepoActions, simpleGit } from "simple-git";

/** The slice of simple-git these queries use. A `SimpleGit` instance satisfies it. */
export interface GitClient {
  checkIsRepo(action: CheckRepoActions): Promise<boolean>;
  revparse(options: string[]): Promise<string>;
}

/**
 * Read-only git queries against one checkout. Wraps simple-git so tests can inject it.
 */
export class GitOperations {
  private readonly repoPath: string;
  private git: GitClient;

  constructor(repoPath: string, git?: GitClient) {
    this.repoPath = repoPath;
    this.git = git ?? simpleGit(repoPath);
  }

  /**
   * True when the directory is the top level of a work tree. Linked worktrees
   * and submodules count; plain directories inside an enclosing repo do not.
   */
  async isCheckout(): Promise<boolean> {
    if (!(await this.git.checkIsRepo(CheckRepoActions.IN_TREE))) return false;
    const toplevel = (await this.git.revparse(["--show-toplevel"])).trim();
    return path.resolve(toplevel) === fs.realpathSync(this.repoPath);
  }

  /** Get the full HEAD commit id. */
  async getCurrentSha(): Promise<string> {
    const result = await this.git.revparse(["--verify", "HEAD^{commit}"]);
    return result.trim();
  }
}

import { IoError, errorMessage } from "../core/errors.js";
import { GitOperations } from "../git/operations.js";
import { normalizeRevision } from "../extract/revision.js";
import type { RepositoryLayout } from "../types/reference.js";

/** Reads the checkout state of one repository directory. */
export interface HeadReader {
  isCheckout(repoPath: string): Promise<boolean>;
  head(repoPath: string): Promise<string>;
}

export const gitHeadReader: HeadReader = {
  isCheckout: (repoPath) => new GitOperations(repoPath).isCheckout(),
  head: (repoPath) => new GitOperations(repoPath).getCurrentSha(),
};

/**
 * Map each sibling checkout to its current commit. Directories that are not
 * git checkouts have no ground truth, unless they are required repositories.
 * A required repository that is not a checkout, or a checkout whose HEAD
 * cannot be read, aborts the run.
 */
export async function resolveGroundTruth(
  repositories: RepositoryLayout[],
  reader: HeadReader = gitHeadReader,
  required: readonly string[] = [],
): Promise<Map<string, string>> {
  const truth = new Map<string, string>();

  for (const repo of repositories) {
    if (!(await reader.isCheckout(repo.path))) {
      if (required.includes(repo.name)) {
        throw new IoError("CHECKOUT_UNREADABLE", `${repo.name} is not a git checkout: ${repo.path}`, repo.path);
      }
      continue;
    }

    let head: string;
    try {
      head = await reader.head(repo.path);
    } catch (e) {
      throw new IoError("CHECKOUT_UNREADABLE", `Cannot read HEAD of ${repo.name}: ${errorMessage(e)}`, repo.path, { cause: e });
    }

    const revision = normalizeRevision(head);
    if (!revision.ok) {
      throw new IoError("CHECKOUT_UNREADABLE", `Unexpected HEAD for ${repo.name}: ${head} (${revision.reason})`, repo.path);
    }
    truth.set(repo.name, revision.value);
  }

  return truth;
}

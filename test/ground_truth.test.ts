import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { CheckRepoActions } from "simple-git";
import { IoError } from "../src/core/errors.js";
import { GitOperations, type GitClient } from "../src/git/operations.js";
import { resolveGroundTruth, type HeadReader } from "../src/resolve/ground-truth.js";
import type { RepositoryLayout } from "../src/types/reference.js";
import { REV, fakeHeads, makeTmpRoot } from "./helpers/fixtures.js";

function layout(name: string): RepositoryLayout {
  return { name, path: `/work/${name}`, dependencyManifests: [] };
}

describe("resolveGroundTruth", () => {
  it("maps each checkout to its HEAD and skips plain directories", async () => {
    const truth = await resolveGroundTruth(
      [layout("crucible"), layout("notes"), layout("propolis")],
      fakeHeads({ crucible: REV.crucibleHead.toUpperCase(), propolis: REV.propolisHead }),
    );
    expect([...truth]).toEqual([
      ["crucible", REV.crucibleHead],
      ["propolis", REV.propolisHead],
    ]);
  });

  it("aborts when a checkout's HEAD cannot be read", async () => {
    const reader: HeadReader = {
      isCheckout: async () => true,
      head: async () => {
        throw new Error("fatal: ambiguous argument 'HEAD^{commit}'");
      },
    };
    await expect(resolveGroundTruth([layout("dendrite")], reader)).rejects.toThrow(
      "Cannot read HEAD of dendrite: fatal: ambiguous argument 'HEAD^{commit}'",
    );
    await expect(resolveGroundTruth([layout("dendrite")], reader)).rejects.toBeInstanceOf(IoError);
  });

  it("aborts on a HEAD that is not a commit id", async () => {
    await expect(resolveGroundTruth([layout("opte")], fakeHeads({ opte: "ref: refs/heads/master" }))).rejects.toThrow(
      "Unexpected HEAD for opte",
    );
  });
});

describe("resolveGroundTruth with required repositories", () => {
  it("aborts when a required repository is not a checkout", async () => {
    const run = resolveGroundTruth(
      [layout("crucible"), layout("propolis")],
      fakeHeads({ crucible: REV.crucibleHead }),
      ["crucible", "propolis"],
    );
    await expect(run).rejects.toMatchObject({
      code: "CHECKOUT_UNREADABLE",
      message: "propolis is not a git checkout: /work/propolis",
    });
  });

  it("still skips plain directories that are not required", async () => {
    const truth = await resolveGroundTruth(
      [layout("crucible"), layout("notes")],
      fakeHeads({ crucible: REV.crucibleHead }),
      ["crucible"],
    );
    expect([...truth]).toEqual([["crucible", REV.crucibleHead]]);
  });
});

type StubGit = GitClient & { actions: CheckRepoActions[]; revparseCalls: string[][] };

function stubGit(opts: { inTree: boolean; toplevel?: string; head?: string | Error }): StubGit {
  const actions: CheckRepoActions[] = [];
  const revparseCalls: string[][] = [];
  return {
    actions,
    revparseCalls,
    checkIsRepo: async (action) => {
      actions.push(action);
      return opts.inTree;
    },
    revparse: async (options) => {
      revparseCalls.push(options);
      if (options[0] === "--show-toplevel") return `${opts.toplevel ?? ""}\n`;
      if (opts.head instanceof Error) throw opts.head;
      return `${opts.head ?? ""}\n`;
    },
  };
}

describe("GitOperations", () => {
  let root: string;
  let repo: string;

  beforeEach(() => {
    root = makeTmpRoot();
    repo = path.join(root, "propolis");
    fs.mkdirSync(repo);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("counts a work tree whose top level is the directory itself", async () => {
    const git = stubGit({ inTree: true, toplevel: fs.realpathSync(repo) });

    expect(await new GitOperations(repo, git).isCheckout()).toBe(true);
    expect(git.actions).toEqual([CheckRepoActions.IN_TREE]);
    expect(git.revparseCalls).toEqual([["--show-toplevel"]]);
  });

  it("counts a linked worktree or submodule, which has a .git file", async () => {
    fs.writeFileSync(path.join(repo, ".git"), "gitdir: ../omicron/.git/worktrees/propolis\n");
    const git = stubGit({ inTree: true, toplevel: fs.realpathSync(repo) });

    expect(await new GitOperations(repo, git).isCheckout()).toBe(true);
  });

  it("rejects a directory nested inside an enclosing repository", async () => {
    const git = stubGit({ inTree: true, toplevel: fs.realpathSync(root) });

    expect(await new GitOperations(repo, git).isCheckout()).toBe(false);
  });

  it("rejects a directory outside any work tree without asking for the top level", async () => {
    const git = stubGit({ inTree: false });

    expect(await new GitOperations(repo, git).isCheckout()).toBe(false);
    expect(git.revparseCalls).toEqual([]);
  });

  it("reads HEAD as a verified commit", async () => {
    const git = stubGit({ inTree: true, head: REV.propolisHead });

    expect(await new GitOperations(repo, git).getCurrentSha()).toBe(REV.propolisHead);
    expect(git.revparseCalls).toEqual([["--verify", "HEAD^{commit}"]]);
  });

  it("turns a failed HEAD lookup into a fatal checkout error", async () => {
    const git = stubGit({
      inTree: true,
      toplevel: fs.realpathSync(repo),
      head: new Error("fatal: Needed a single revision"),
    });
    const reader: HeadReader = {
      isCheckout: (repoPath) => new GitOperations(repoPath, git).isCheckout(),
      head: (repoPath) => new GitOperations(repoPath, git).getCurrentSha(),
    };

    await expect(
      resolveGroundTruth([{ name: "propolis", path: repo, dependencyManifests: [] }], reader),
    ).rejects.toMatchObject({
      code: "CHECKOUT_UNREADABLE",
      message: "Cannot read HEAD of propolis: fatal: Needed a single revision",
    });
  });
});

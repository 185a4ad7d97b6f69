import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { cacheKey } from "../../src/registry/availability.js";
import type { ArtifactKey, ArtifactRegistry } from "../../src/registry/client.js";
import type { HeadReader } from "../../src/resolve/ground-truth.js";
import type { ArtifactQueryResult } from "../../src/types/report.js";

export const REV = {
  propolisOld: "ec4f3a41a638ea6c3316a86f30f1895f4877f2ef",
  propolisHead: "eaec980e060b368c4ca39aaaaf7757cecdb43ecc",
  crucibleOld: "257032d1e842901d427f344a396d78b9b85b183f",
  crucibleHead: "cb363bcb1976093437be33d0160667cd89e53611",
  maghemiteHead: "47ef18a5b0eb7a208ae43e669cf0a93d65576114",
} as const;

export const DIGEST = {
  crucibleOld: "9f73687e4d883a7277af6655e77026188144ada144e4243c90cc139a9a9df6d7",
  crucibleNew: "174856320e151aeeb12c595392c2289934a0345f669126297cce9ca7249099e3",
  propolis: "0d9a1c7e3b5f28466a0c2e4b8d1f3a5c7e9b0d2f4a6c8e0b2d4f6a8c0e2b4d6f",
} as const;

export function makeTmpRoot(prefix = "lockstep-root-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Write files relative to `root`, creating parent directories. */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, rel);
    fs.mkdirSync(path.dirname(abs), { recursive: true });
    fs.writeFileSync(abs, content, "utf8");
  }
}

/** Registry stand-in answering from a fixed table; unknown keys are 404s. */
export class FakeRegistry implements ArtifactRegistry {
  readonly calls: ArtifactKey[] = [];

  constructor(private readonly results: Record<string, ArtifactQueryResult> = {}) {}

  async query(key: ArtifactKey): Promise<ArtifactQueryResult> {
    this.calls.push(key);
    return this.results[cacheKey(key)] ?? { status: "not-found", detail: "404 Not Found" };
  }
}

/** HEAD reader stand-in: directories named in `heads` are checkouts at that commit. */
export function fakeHeads(heads: Record<string, string>): HeadReader {
  return {
    isCheckout: async (repoPath) => path.basename(repoPath) in heads,
    head: async (repoPath) => {
      const head = heads[path.basename(repoPath)];
      if (head === undefined) throw new Error(`fatal: not a git repository: ${repoPath}`);
      return head;
    },
  };
}

export function gitDep(repo: string, rev: string): string {
  return `{ git = "https://github.com/oxidecomputer/${repo}", rev = "${rev}" }`;
}

export function lockPackage(name: string, repo: string, rev: string): string {
  return [
    "[[package]]",
    `name = "${name}"`,
    `version = "0.1.0"`,
    `source = "git+https://github.com/oxidecomputer/${repo}?rev=${rev}#${rev}"`,
    "",
  ].join("\n");
}

export function prebuilt(name: string, repo: string, commit: string, sha256: string): string {
  return [
    `[package.${name}]`,
    `service_name = "${name}"`,
    `source.type = "prebuilt"`,
    `source.repo = "${repo}"`,
    `source.commit = "${commit}"`,
    `source.sha256 = "${sha256}"`,
    "",
  ].join("\n");
}

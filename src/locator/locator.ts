import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import { IoError, errorMessage } from "../core/errors.js";
import { readToml, stringsAt, tableAt } from "../manifest/toml.js";
import type { ManifestNames } from "../types/config.js";
import type { RepositoryLayout } from "../types/reference.js";

export type LocateOptions = {
  root: string;
  consumer: string;
  manifests: ManifestNames;
  /** Repositories that must be checked out under the root. */
  requiredRepositories?: string[];
};

const GLOB_CHARS = /[*?[\]{}]/;

function listDirectories(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((e) => e.isDirectory() && !e.name.startsWith("."))
    .map((e) => e.name)
    .sort();
}

function fileIfPresent(filePath: string): string | undefined {
  return fs.existsSync(filePath) && fs.statSync(filePath).isFile() ? filePath : undefined;
}

/** Expand one `workspace.members` entry into member directories, segment by segment. */
function expandMember(workspaceDir: string, member: string): string[] {
  const segments = member.split("/").filter((s) => s.length > 0 && s !== ".");
  let dirs = [workspaceDir];
  for (const segment of segments) {
    if (!GLOB_CHARS.test(segment)) {
      dirs = dirs.map((d) => path.join(d, segment));
      continue;
    }
    dirs = dirs.flatMap((d) => listDirectories(d).filter((name) => minimatch(name, segment)).map((name) => path.join(d, name)));
  }
  return dirs;
}

/**
 * Collect a Cargo.toml and, recursively, the Cargo.toml of every workspace
 * member it lists. Members without a manifest are skipped.
 */
function collectDependencyManifests(manifestPath: string, fileName: string, seen: Set<string>): string[] {
  if (seen.has(manifestPath)) return [];
  seen.add(manifestPath);

  const dir = path.dirname(manifestPath);
  const workspace = tableAt(readToml(manifestPath), "workspace");
  const excludes = stringsAt(workspace, "exclude").map((e) => path.posix.normalize(e).replace(/\/+$/, ""));

  const members = stringsAt(workspace, "members")
    .flatMap((m) => expandMember(dir, m))
    .filter((memberDir) => {
      const rel = path.relative(dir, memberDir).split(path.sep).join("/");
      return !excludes.some((ex) => rel === ex || minimatch(rel, ex));
    })
    .map((memberDir) => fileIfPresent(path.join(memberDir, fileName)))
    .filter((p): p is string => p !== undefined)
    .sort();

  const result = [manifestPath];
  for (const member of members) {
    result.push(...collectDependencyManifests(member, fileName, seen));
  }
  return result;
}

/**
 * Find the manifests of every repository checked out under `root`.
 * Missing manifests are not errors; an unreadable root or a missing required
 * repository is.
 */
export function locateRepositories(opts: LocateOptions): RepositoryLayout[] {
  const root = path.resolve(opts.root);

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(root, { withFileTypes: true });
  } catch (e) {
    throw new IoError("ROOT_UNREADABLE", `Cannot read root directory ${root}: ${errorMessage(e)}`, root, { cause: e });
  }

  const names = entries
    .filter((e) => e.isDirectory() && !e.name.startsWith("."))
    .map((e) => e.name)
    .sort();

  for (const required of opts.requiredRepositories ?? []) {
    if (!names.includes(required)) {
      throw new IoError(
        "REPOSITORY_MISSING",
        `Cannot find your local checkout of ${required} in ${root}`,
        path.join(root, required),
      );
    }
  }

  return names.map((name) => {
    const repoPath = path.join(root, name);
    const rootManifest = fileIfPresent(path.join(repoPath, opts.manifests.dependency));
    const layout: RepositoryLayout = {
      name,
      path: repoPath,
      dependencyManifests: rootManifest
        ? collectDependencyManifests(rootManifest, opts.manifests.dependency, new Set())
        : [],
    };

    const lockFile = fileIfPresent(path.join(repoPath, opts.manifests.lock));
    if (lockFile) layout.lockFile = lockFile;

    if (name === opts.consumer) {
      const packageManifest = fileIfPresent(path.join(repoPath, opts.manifests.package));
      if (packageManifest) layout.packageManifest = packageManifest;
    }

    return layout;
  });
}

import type { DependencyManifest, LockFile, ManifestDocument, PackageManifest } from "../manifest/document.js";
import { isTable, stringAt, tableAt, type TomlTable } from "../manifest/toml.js";
import type { DependencyReference, StructuralManifestError } from "../types/reference.js";
import { normalizeDigest, normalizeRevision, producerFromGitUrl } from "./revision.js";

export type Extraction = {
  references: DependencyReference[];
  errors: StructuralManifestError[];
};

const DEPENDENCY_TABLES = ["dependencies", "dev-dependencies", "build-dependencies"] as const;
const PACKAGE_TABLES = ["package", "external_package"] as const;

/** Every dependency table of a Cargo.toml, including workspace and target-specific ones. */
function dependencyTables(doc: TomlTable): TomlTable[] {
  const tables = DEPENDENCY_TABLES.map((key) => tableAt(doc, key));
  tables.push(tableAt(doc, "workspace", "dependencies"));
  for (const target of Object.values(tableAt(doc, "target"))) {
    if (!isTable(target)) continue;
    tables.push(...DEPENDENCY_TABLES.map((key) => tableAt(target, key)));
  }
  return tables;
}

function extractDependencyManifest(manifest: DependencyManifest, out: Extraction): void {
  for (const table of dependencyTables(manifest.doc)) {
    for (const [dependency, entry] of Object.entries(table)) {
      if (!isTable(entry)) continue;
      const git = stringAt(entry, "git");
      const rev = stringAt(entry, "rev");
      if (git === undefined || rev === undefined) continue;

      const producer = producerFromGitUrl(git);
      if (producer === undefined || producer === manifest.owner) continue;

      const revision = normalizeRevision(rev);
      if (!revision.ok) {
        out.errors.push({ manifest: manifest.path, dependency, field: "rev", value: rev, reason: revision.reason });
        continue;
      }

      out.references.push({
        producer,
        dependency,
        kind: manifest.kind,
        revision: revision.value,
        manifest: manifest.path,
        owner: manifest.owner,
      });
    }
  }
}

function extractLockFile(lock: LockFile, out: Extraction): void {
  const packages = lock.doc["package"];
  if (!Array.isArray(packages)) return;

  for (const pkg of packages) {
    if (!isTable(pkg)) continue;
    const name = stringAt(pkg, "name");
    const source = stringAt(pkg, "source");
    if (name === undefined || source === undefined || !source.startsWith("git+")) continue;

    const producer = producerFromGitUrl(source);
    if (producer === undefined || producer === lock.owner) continue;

    const hash = source.indexOf("#");
    if (hash < 0) {
      out.errors.push({ manifest: lock.path, dependency: name, field: "source", value: source, reason: "missing resolved commit" });
      continue;
    }

    const resolved = source.slice(hash + 1);
    const revision = normalizeRevision(resolved);
    if (!revision.ok) {
      out.errors.push({ manifest: lock.path, dependency: name, field: "source", value: resolved, reason: revision.reason });
      continue;
    }

    out.references.push({
      producer,
      dependency: name,
      kind: lock.kind,
      revision: revision.value,
      manifest: lock.path,
      owner: lock.owner,
    });
  }
}

function extractPackageManifest(manifest: PackageManifest, out: Extraction): void {
  for (const tableName of PACKAGE_TABLES) {
    for (const [entry, pkg] of Object.entries(tableAt(manifest.doc, tableName))) {
      if (!isTable(pkg)) continue;
      const source = tableAt(pkg, "source");
      if (stringAt(source, "type") !== "prebuilt") continue;

      const producer = stringAt(source, "repo");
      const commit = stringAt(source, "commit");
      if (producer === undefined || commit === undefined || producer === manifest.owner) continue;

      const revision = normalizeRevision(commit);
      if (!revision.ok) {
        out.errors.push({ manifest: manifest.path, dependency: entry, field: "commit", value: commit, reason: revision.reason });
        continue;
      }

      const ref: DependencyReference = {
        producer,
        dependency: entry,
        kind: manifest.kind,
        revision: revision.value,
        manifest: manifest.path,
        owner: manifest.owner,
      };

      const sha256 = stringAt(source, "sha256");
      if (sha256 !== undefined) {
        const digest = normalizeDigest(sha256);
        if (!digest.ok) {
          out.errors.push({ manifest: manifest.path, dependency: entry, field: "sha256", value: sha256, reason: digest.reason });
          continue;
        }
        ref.digest = digest.value;
      }

      out.references.push(ref);
    }
  }
}

/**
 * Turn one parsed manifest into dependency references.
 * Malformed revisions and digests are collected as structural errors; the
 * remaining entries are still extracted.
 */
export function extractReferences(manifest: ManifestDocument): Extraction {
  const out: Extraction = { references: [], errors: [] };
  switch (manifest.kind) {
    case "dependency-manifest":
      extractDependencyManifest(manifest, out);
      break;
    case "lock-file":
      extractLockFile(manifest, out);
      break;
    case "package-manifest":
      extractPackageManifest(manifest, out);
      break;
    default: {
      const unreachable: never = manifest;
      throw new Error(`Unsupported manifest: ${JSON.stringify(unreachable)}`);
    }
  }
  return out;
}

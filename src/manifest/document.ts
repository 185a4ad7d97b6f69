import type { SourceKind } from "../types/reference.js";
import { readToml, type TomlTable } from "./toml.js";

type DocumentBase = {
  /** Absolute path of the manifest file. */
  path: string;
  /** Name of the repository that owns the manifest. */
  owner: string;
  doc: TomlTable;
};

export type DependencyManifest = DocumentBase & { kind: "dependency-manifest" };
export type LockFile = DocumentBase & { kind: "lock-file" };
export type PackageManifest = DocumentBase & { kind: "package-manifest" };

export type ManifestDocument = DependencyManifest | LockFile | PackageManifest;

/** Read a manifest from disk and tag it with its source kind. */
export function loadManifest(kind: SourceKind, filePath: string, owner: string): ManifestDocument {
  return { kind, path: filePath, owner, doc: readToml(filePath) };
}

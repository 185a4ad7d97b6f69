/** Where a declared revision was read from. */
export type SourceKind = "dependency-manifest" | "lock-file" | "package-manifest";

/** Kinds in report order. */
export const SOURCE_KINDS: readonly SourceKind[] = ["dependency-manifest", "lock-file", "package-manifest"];

/** A sibling checkout under the root directory. */
export type RepositoryLayout = {
  name: string;
  path: string;
  /** Root Cargo.toml first, then workspace members in sorted order. */
  dependencyManifests: string[];
  lockFile?: string;
  /** Only located for the consumer repository. */
  packageManifest?: string;
};

/**
 * A single pointer from one manifest to a producer revision.
 * `revision` is always a lower-case 40-hex commit id.
 */
export type DependencyReference = {
  producer: string;
  /** Crate, lock package or package-manifest entry name. */
  dependency: string;
  kind: SourceKind;
  revision: string;
  /** Package-manifest entries only; lower-case 64-hex sha256. */
  digest?: string;
  manifest: string;
  owner: string;
};

export type StructuralManifestError = {
  manifest: string;
  dependency: string;
  field: "rev" | "source" | "commit" | "sha256";
  value: string;
  reason: string;
};

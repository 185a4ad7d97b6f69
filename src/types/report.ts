import type { SourceKind, StructuralManifestError } from "./reference.js";

export type UpdateManifestRevision = {
  type: "update-revision";
  manifest: string;
  manifestKind: SourceKind;
  producer: string;
  /** Package-manifest entry name; absent for Cargo manifests and lock files. */
  entry?: string;
  from: string;
  to: string;
};

export type UpdatePackageManifestDigest = {
  type: "update-digest";
  manifest: string;
  manifestKind: "package-manifest";
  producer: string;
  entry: string;
  /** Absent when the manifest records no digest yet. */
  from?: string;
  to: string;
};

export type WaitForArtifact = {
  type: "wait-for-artifact";
  manifest: string;
  manifestKind: "package-manifest";
  producer: string;
  entry: string;
  revision: string;
  reason: string;
};

export type Action = UpdateManifestRevision | UpdatePackageManifestDigest | WaitForArtifact;

export type UnresolvedProducer = {
  producer: string;
  /** Manifests naming the producer, sorted. */
  referencedBy: string[];
};

export type ReconcileReport = {
  actions: Action[];
  structuralErrors: StructuralManifestError[];
  unresolved: UnresolvedProducer[];
};

/** Outcome of one registry lookup. */
export type ArtifactQueryResult =
  | { status: "found"; digest: string }
  | { status: "not-found"; detail: string }
  | { status: "transient-error"; detail: string };

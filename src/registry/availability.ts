import type { DependencyReference } from "../types/reference.js";
import type { Action, ArtifactQueryResult } from "../types/report.js";
import type { ArtifactKey, ArtifactRegistry } from "./client.js";

/** Registry results already seen during one run, keyed by `cacheKey`. */
export type AvailabilityCache = ReadonlyMap<string, ArtifactQueryResult>;

export function cacheKey(key: ArtifactKey): string {
  return `${key.producer}/${key.artifact}@${key.revision}`;
}

/** Query the registry unless the cache already holds the answer. */
export async function queryArtifact(
  registry: ArtifactRegistry,
  key: ArtifactKey,
  cache: AvailabilityCache,
): Promise<{ result: ArtifactQueryResult; cache: AvailabilityCache }> {
  const k = cacheKey(key);
  const cached = cache.get(k);
  if (cached) return { result: cached, cache };

  const result = await registry.query(key);
  return { result, cache: new Map(cache).set(k, result) };
}

/**
 * Decide the artifact action for one package-manifest entry targeting
 * `revision`: a digest update when the registry has a different digest, a
 * wait when it has none, nothing when the recorded digest is confirmed.
 */
export function artifactActions(ref: DependencyReference, revision: string, result: ArtifactQueryResult): Action[] {
  switch (result.status) {
    case "found":
      if (result.digest === ref.digest) return [];
      return [
        {
          type: "update-digest",
          manifest: ref.manifest,
          manifestKind: "package-manifest",
          producer: ref.producer,
          entry: ref.dependency,
          from: ref.digest,
          to: result.digest,
        },
      ];
    case "not-found":
    case "transient-error":
      return [
        {
          type: "wait-for-artifact",
          manifest: ref.manifest,
          manifestKind: "package-manifest",
          producer: ref.producer,
          entry: ref.dependency,
          revision,
          reason: result.detail,
        },
      ];
  }
}

/** Confirm the artifact for `ref` at `revision`, returning the actions and the updated cache. */
export async function checkAvailability(
  registry: ArtifactRegistry,
  ref: DependencyReference,
  revision: string,
  cache: AvailabilityCache,
): Promise<{ actions: Action[]; cache: AvailabilityCache }> {
  const queried = await queryArtifact(registry, { producer: ref.producer, artifact: ref.dependency, revision }, cache);
  return { actions: artifactActions(ref, revision, queried.result), cache: queried.cache };
}

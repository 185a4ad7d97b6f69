import { checkAvailability, type AvailabilityCache } from "../registry/availability.js";
import type { ArtifactRegistry } from "../registry/client.js";
import type { DependencyReference, StructuralManifestError } from "../types/reference.js";
import type { Action, ReconcileReport, UnresolvedProducer } from "../types/report.js";
import { orderActions, orderStructuralErrors, orderUnresolved } from "./order.js";

export type ReconcileInput = {
  references: DependencyReference[];
  structuralErrors: StructuralManifestError[];
  /** Producer name → current commit of its local checkout. */
  groundTruth: ReadonlyMap<string, string>;
  /** Producers to reconcile; references to anything else are ignored. */
  tracked: ReadonlySet<string>;
  registry: ArtifactRegistry;
  cache?: AvailabilityCache;
};

export type ReconcileOutput = {
  report: ReconcileReport;
  cache: AvailabilityCache;
};

function revisionUpdate(ref: DependencyReference, to: string): Action {
  if (ref.kind === "package-manifest") {
    return {
      type: "update-revision",
      manifest: ref.manifest,
      manifestKind: ref.kind,
      producer: ref.producer,
      entry: ref.dependency,
      from: ref.revision,
      to,
    };
  }
  return {
    type: "update-revision",
    manifest: ref.manifest,
    manifestKind: ref.kind,
    producer: ref.producer,
    from: ref.revision,
    to,
  };
}

function byLocation(a: DependencyReference, b: DependencyReference): number {
  if (a.manifest !== b.manifest) return a.manifest < b.manifest ? -1 : 1;
  if (a.dependency !== b.dependency) return a.dependency < b.dependency ? -1 : 1;
  return 0;
}

function groupByProducer(references: DependencyReference[]): Map<string, DependencyReference[]> {
  const groups = new Map<string, DependencyReference[]>();
  for (const ref of references) {
    const group = groups.get(ref.producer);
    if (group) group.push(ref);
    else groups.set(ref.producer, [ref]);
  }
  return groups;
}

/**
 * Compare every declared revision against the producer's checkout.
 *
 * Each stale reference yields its own revision update, whether or not it
 * agrees with the other manifests. Every package-manifest entry is confirmed
 * against the registry at the ground-truth revision, which yields a digest
 * update or a wait. Producers without a checkout are reported once each and
 * get no actions. Registry queries run one at a time, in producer order.
 */
export async function reconcile(input: ReconcileInput): Promise<ReconcileOutput> {
  const actions: Action[] = [];
  const unresolved: UnresolvedProducer[] = [];
  let cache: AvailabilityCache = input.cache ?? new Map();

  const groups = groupByProducer(input.references.filter((ref) => input.tracked.has(ref.producer)));
  const producers = [...groups.keys()].sort();

  for (const producer of producers) {
    const refs = groups.get(producer) ?? [];
    const truth = input.groundTruth.get(producer);

    if (truth === undefined) {
      unresolved.push({ producer, referencedBy: [...new Set(refs.map((r) => r.manifest))].sort() });
      continue;
    }

    for (const ref of [...refs].sort(byLocation)) {
      if (ref.revision !== truth) actions.push(revisionUpdate(ref, truth));

      if (ref.kind === "package-manifest") {
        const checked = await checkAvailability(input.registry, ref, truth, cache);
        actions.push(...checked.actions);
        cache = checked.cache;
      }
    }
  }

  return {
    report: {
      actions: orderActions(actions),
      structuralErrors: orderStructuralErrors(input.structuralErrors),
      unresolved: orderUnresolved(unresolved),
    },
    cache,
  };
}

import { SOURCE_KINDS, type StructuralManifestError } from "../types/reference.js";
import type { Action, UnresolvedProducer } from "../types/report.js";

const ACTION_RANK: Record<Action["type"], number> = {
  "update-revision": 0,
  "update-digest": 1,
  "wait-for-artifact": 2,
};

function cmp(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Every field of an action, in a fixed order. Two actions are equal when their keys are. */
export function actionKey(a: Action): string {
  switch (a.type) {
    case "update-revision":
      return [a.type, a.manifestKind, a.manifest, a.producer, a.entry ?? "", a.from, a.to].join("\u0000");
    case "update-digest":
      return [a.type, a.manifestKind, a.manifest, a.producer, a.entry, a.from ?? "", a.to].join("\u0000");
    case "wait-for-artifact":
      return [a.type, a.manifestKind, a.manifest, a.producer, a.entry, a.revision, a.reason].join("\u0000");
  }
}

/**
 * Report order: manifest kind, manifest path, producer, action kind, then the
 * remaining fields so that the order is total.
 */
export function compareActions(a: Action, b: Action): number {
  return (
    SOURCE_KINDS.indexOf(a.manifestKind) - SOURCE_KINDS.indexOf(b.manifestKind) ||
    cmp(a.manifest, b.manifest) ||
    cmp(a.producer, b.producer) ||
    ACTION_RANK[a.type] - ACTION_RANK[b.type] ||
    cmp(actionKey(a), actionKey(b))
  );
}

/** Drop duplicate actions and sort the rest. */
export function orderActions(actions: Action[]): Action[] {
  const unique = new Map<string, Action>();
  for (const action of actions) {
    const key = actionKey(action);
    if (!unique.has(key)) unique.set(key, action);
  }
  return [...unique.values()].sort(compareActions);
}

export function orderStructuralErrors(errors: StructuralManifestError[]): StructuralManifestError[] {
  const unique = new Map<string, StructuralManifestError>();
  for (const e of errors) {
    unique.set([e.manifest, e.dependency, e.field, e.value].join("\u0000"), e);
  }
  return [...unique.values()].sort(
    (a, b) => cmp(a.manifest, b.manifest) || cmp(a.dependency, b.dependency) || cmp(a.field, b.field) || cmp(a.value, b.value),
  );
}

export function orderUnresolved(unresolved: UnresolvedProducer[]): UnresolvedProducer[] {
  return [...unresolved].sort((a, b) => cmp(a.producer, b.producer));
}

import path from "node:path";
import type { StructuralManifestError } from "../types/reference.js";
import type { Action, ReconcileReport, UnresolvedProducer } from "../types/report.js";

export type ReportFormat = "human" | "jsonl";

/** `./<repo>/...` relative to the root, with forward slashes. */
export function displayPath(root: string, filePath: string): string {
  const rel = path.relative(root, filePath).split(path.sep).join("/");
  return rel.startsWith("..") || path.isAbsolute(rel) ? filePath : `./${rel}`;
}

function humanAction(root: string, a: Action): string {
  const manifest = displayPath(root, a.manifest);
  switch (a.type) {
    case "update-revision":
      return `update ${manifest} ${a.entry ?? a.producer} rev from ${a.from} to ${a.to}`;
    case "update-digest":
      return a.from === undefined
        ? `set ${manifest} ${a.entry} sha256 to ${a.to}`
        : `update ${manifest} ${a.entry} sha256 from ${a.from} to ${a.to}`;
    case "wait-for-artifact":
      return `wait for ${a.entry} image for ${a.revision} to be built (registry returned ${a.reason})`;
  }
}

function humanStructural(root: string, e: StructuralManifestError): string {
  return `malformed ${e.field} for ${e.dependency} in ${displayPath(root, e.manifest)}: ${JSON.stringify(e.value)} (${e.reason})`;
}

function humanUnresolved(root: string, u: UnresolvedProducer): string {
  const refs = u.referencedBy.map((m) => displayPath(root, m)).join(", ");
  return `cannot reconcile ${u.producer}: no local checkout (referenced by ${refs})`;
}

const ACTION_CODES: Record<Action["type"], string> = {
  "update-revision": "UPDATE_REVISION",
  "update-digest": "UPDATE_DIGEST",
  "wait-for-artifact": "WAIT_FOR_ARTIFACT",
};

function jsonAction(root: string, a: Action): Record<string, unknown> {
  const { type: _type, ...fields } = a;
  return { level: "info", code: ACTION_CODES[a.type], ...fields, manifest: displayPath(root, a.manifest) };
}

/**
 * Render a report as output lines: structural errors, then unresolved
 * producers, then actions. An empty report renders no lines.
 */
export function formatReport(report: ReconcileReport, root: string, format: ReportFormat = "human"): string[] {
  if (format === "jsonl") {
    return [
      ...report.structuralErrors.map((e) =>
        JSON.stringify({ level: "error", code: "STRUCTURAL_MANIFEST_ERROR", ...e, manifest: displayPath(root, e.manifest) }),
      ),
      ...report.unresolved.map((u) =>
        JSON.stringify({
          level: "warn",
          code: "UNRESOLVED_PRODUCER",
          producer: u.producer,
          referencedBy: u.referencedBy.map((m) => displayPath(root, m)),
        }),
      ),
      ...report.actions.map((a) => JSON.stringify(jsonAction(root, a))),
    ];
  }

  return [
    ...report.structuralErrors.map((e) => humanStructural(root, e)),
    ...report.unresolved.map((u) => humanUnresolved(root, u)),
    ...report.actions.map((a) => humanAction(root, a)),
  ];
}

import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { IoError } from "../core/errors.js";
import { extractReferences } from "../extract/extractor.js";
import { locateRepositories } from "../locator/locator.js";
import { loadManifest, type ManifestDocument } from "../manifest/document.js";
import { reconcile } from "../reconcile/checker.js";
import { HttpArtifactRegistry, type ArtifactRegistry } from "../registry/client.js";
import { gitHeadReader, resolveGroundTruth, type HeadReader } from "../resolve/ground-truth.js";
import type { LockstepConfig } from "../types/config.js";
import type { DependencyReference, RepositoryLayout, StructuralManifestError } from "../types/reference.js";
import type { ReconcileReport } from "../types/report.js";

export type CheckResult =
  | { ok: true; root: string; report: ReconcileReport }
  | { ok: false; error: { code: string; message: string } };

export type CheckOptions = {
  root: string;
  configDir?: string;
  envName?: string;
  consumer?: string;
  verbose?: boolean;
  env?: NodeJS.ProcessEnv;
  /** Overrides the HTTP registry built from config. */
  registry?: ArtifactRegistry;
  headReader?: HeadReader;
};

function manifestsOf(repo: RepositoryLayout): ManifestDocument[] {
  const docs = repo.dependencyManifests.map((p) => loadManifest("dependency-manifest", p, repo.name));
  if (repo.lockFile) docs.push(loadManifest("lock-file", repo.lockFile, repo.name));
  if (repo.packageManifest) docs.push(loadManifest("package-manifest", repo.packageManifest, repo.name));
  return docs;
}

async function checkWithConfig(opts: CheckOptions, config: LockstepConfig, root: string): Promise<ReconcileReport> {
  const log = (message: string): void => {
    if (opts.verbose) console.error(`[lockstep] ${message}`);
  };

  const repositories = locateRepositories({
    root,
    consumer: config.consumer,
    manifests: config.manifests,
    requiredRepositories: config.required_repositories,
  });
  log(`found ${repositories.length} repositories under ${root}`);

  const references: DependencyReference[] = [];
  const structuralErrors: StructuralManifestError[] = [];
  for (const repo of repositories) {
    for (const manifest of manifestsOf(repo)) {
      const extracted = extractReferences(manifest);
      references.push(...extracted.references);
      structuralErrors.push(...extracted.errors);
    }
  }
  log(`extracted ${references.length} references, ${structuralErrors.length} malformed entries`);

  const groundTruth = await resolveGroundTruth(
    repositories,
    opts.headReader ?? gitHeadReader,
    config.required_repositories,
  );
  for (const [name, rev] of groundTruth) log(`${name} is at ${rev}`);

  const tracked = new Set(config.producers ?? repositories.map((r) => r.name));
  const { report } = await reconcile({
    references,
    structuralErrors,
    groundTruth,
    tracked,
    registry: opts.registry ?? new HttpArtifactRegistry(config.registry),
  });
  log(`${report.actions.length} actions`);

  return report;
}

/**
 * Reconcile every checkout under `root`. Only configuration and filesystem
 * failures are errors; everything else ends up in the report.
 */
export async function runCheck(opts: CheckOptions): Promise<CheckResult> {
  const loaded = loadConfig(opts.envName, opts.configDir, opts.env);
  if (!loaded.ok) {
    return { ok: false, error: { code: "INVALID_CONFIG", message: `Invalid configuration: ${loaded.errors}` } };
  }

  const config = opts.consumer ? { ...loaded.config, consumer: opts.consumer } : loaded.config;
  const root = path.resolve(opts.root);

  try {
    return { ok: true, root, report: await checkWithConfig(opts, config, root) };
  } catch (e) {
    if (e instanceof IoError) {
      return { ok: false, error: { code: e.code, message: e.message } };
    }
    throw e;
  }
}

/** Configuration types for the layered config system. */
export type ManifestNames = {
  dependency: string;
  lock: string;
  package: string;
};

export type RegistryConfig = {
  base_url: string;
  path_template: string;
  timeout_ms: number;
  max_attempts: number;
  backoff_ms: number;
};

export type LockstepConfig = {
  schema_version: string;
  consumer: string;
  /** Producers to reconcile. Every sibling checkout when omitted. */
  producers?: string[];
  required_repositories?: string[];
  manifests: ManifestNames;
  registry: RegistryConfig;
};

import { errorMessage } from "../core/errors.js";
import { normalizeDigest } from "../extract/revision.js";
import type { RegistryConfig } from "../types/config.js";
import type { ArtifactQueryResult } from "../types/report.js";

/** An artifact is looked up by the repository that builds it, its name and the source commit. */
export type ArtifactKey = {
  producer: string;
  artifact: string;
  revision: string;
};

export interface ArtifactRegistry {
  query(key: ArtifactKey): Promise<ArtifactQueryResult>;
}

export type FetchResponse = {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
};

export type FetchFn = (url: string, init: { signal: AbortSignal }) => Promise<FetchResponse>;

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

function statusLine(res: FetchResponse): string {
  return res.statusText ? `${res.status} ${res.statusText}` : String(res.status);
}

/**
 * Artifact registry over plain HTTP GET. The artifact's sha256 is served as a
 * text file at `<base_url>/<path_template>`.
 */
export class HttpArtifactRegistry implements ArtifactRegistry {
  private readonly config: RegistryConfig;
  private readonly fetchFn: FetchFn;
  private readonly sleep: Sleep;

  constructor(config: RegistryConfig, deps: { fetch?: FetchFn; sleep?: Sleep } = {}) {
    this.config = config;
    this.fetchFn = deps.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = deps.sleep ?? defaultSleep;
  }

  artifactUrl(key: ArtifactKey): string {
    const base = this.config.base_url.replace(/\/+$/, "");
    const rel = this.config.path_template
      .replaceAll("{repo}", encodeURIComponent(key.producer))
      .replaceAll("{commit}", encodeURIComponent(key.revision))
      .replaceAll("{name}", encodeURIComponent(key.artifact))
      .replace(/^\/+/, "");
    return `${base}/${rel}`;
  }

  /**
   * Query with a bounded number of attempts. Only transient errors are retried;
   * `not-found` and `found` are final.
   */
  async query(key: ArtifactKey): Promise<ArtifactQueryResult> {
    const attempts = Math.max(1, this.config.max_attempts);
    let result = await this.queryOnce(key);

    for (let attempt = 1; attempt < attempts && result.status === "transient-error"; attempt++) {
      const delay = this.config.backoff_ms * attempt;
      console.warn(
        `[lockstep] ${key.artifact}@${key.revision}: ${result.detail}; retrying in ${delay}ms (${attempt + 1}/${attempts})`,
      );
      await this.sleep(delay);
      result = await this.queryOnce(key);
    }

    return result;
  }

  private async queryOnce(key: ArtifactKey): Promise<ArtifactQueryResult> {
    let res: FetchResponse;
    let body: string;
    try {
      res = await this.fetchFn(this.artifactUrl(key), { signal: AbortSignal.timeout(this.config.timeout_ms) });
      // Read on every status, error responses included.
      body = await res.text();
    } catch (e) {
      if (e instanceof Error && e.name === "TimeoutError") {
        return { status: "transient-error", detail: `timed out after ${this.config.timeout_ms}ms` };
      }
      return { status: "transient-error", detail: errorMessage(e) };
    }

    if (res.status === 404) return { status: "not-found", detail: statusLine(res) };
    if (!res.ok) return { status: "transient-error", detail: statusLine(res) };

    // Either a bare digest or `sha256sum` output ("<digest>  <file>").
    const digest = normalizeDigest(body.trim().split(/\s+/)[0] ?? "");
    if (!digest.ok) {
      return { status: "transient-error", detail: `unexpected artifact digest (${digest.reason})` };
    }
    return { status: "found", digest: digest.value };
  }
}

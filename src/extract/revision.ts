const COMMIT_RE = /^[0-9a-f]{40}$/;
const DIGEST_RE = /^[0-9a-f]{64}$/;

export type Checked = { ok: true; value: string } | { ok: false; reason: string };

/** Normalize a git commit id: trimmed, lower-case, exactly 40 hex characters. */
export function normalizeRevision(raw: string): Checked {
  const value = raw.trim().toLowerCase();
  if (value.length !== 40) return { ok: false, reason: "expected 40 hex characters" };
  if (!COMMIT_RE.test(value)) return { ok: false, reason: "not a hex commit id" };
  return { ok: true, value };
}

/** Normalize a sha256 digest: trimmed, lower-case, exactly 64 hex characters. */
export function normalizeDigest(raw: string): Checked {
  const value = raw.trim().toLowerCase();
  if (value.length !== 64) return { ok: false, reason: "expected 64 hex characters" };
  if (!DIGEST_RE.test(value)) return { ok: false, reason: "not a hex sha256 digest" };
  return { ok: true, value };
}

/**
 * Repository name from a git URL: last path segment without `.git`.
 * Accepts `git+` prefixes, queries, fragments and scp-like `host:org/repo` forms.
 */
export function producerFromGitUrl(url: string): string | undefined {
  const bare = url.trim().replace(/^git\+/, "").split(/[?#]/)[0].replace(/\/+$/, "");
  const last = bare.split(/[/:]/).pop() ?? "";
  const name = last.replace(/\.git$/, "");
  return name.length > 0 ? name : undefined;
}

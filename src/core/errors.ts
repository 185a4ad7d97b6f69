export type IoErrorCode =
  | "ROOT_UNREADABLE"
  | "REPOSITORY_MISSING"
  | "CHECKOUT_UNREADABLE"
  | "MANIFEST_UNREADABLE";

/**
 * Fatal filesystem or checkout failure. Aborts the run; everything else is
 * accumulated into the report.
 */
export class IoError extends Error {
  readonly code: IoErrorCode;
  readonly path: string;

  constructor(code: IoErrorCode, message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IoError";
    this.code = code;
    this.path = path;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

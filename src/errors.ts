/**
 * Module: Error Taxonomy
 * Purpose: Typed failures for the fusion stage (missing or empty sources) and for remote
 * sheet synchronization, plus the classifier that maps a raw API failure to a kind.
 */
export type FusionErrorCode = "MissingSourceFile" | "EmptySourceDataset" | "PartialSourceUnavailable";

export class FusionError extends Error {
  readonly code: FusionErrorCode;
  readonly path?: string;

  constructor(code: FusionErrorCode, message: string, path?: string) {
    super(message);
    this.name = "FusionError";
    this.code = code;
    this.path = path;
  }
}

export type SheetSyncErrorCode =
  | "RemoteQuotaExceeded"
  | "RemotePermissionDenied"
  | "RemoteCapacityExceeded"
  | "RemoteUnknownError";

export class SheetSyncError extends Error {
  readonly code: SheetSyncErrorCode;
  readonly status?: number;
  readonly retryable: boolean;
  readonly reason: string;

  constructor(code: SheetSyncErrorCode, reason: string, opts: { status?: number; cause?: unknown } = {}) {
    super(`${code}: ${reason}`, { cause: opts.cause });
    this.name = "SheetSyncError";
    this.code = code;
    this.status = opts.status;
    this.reason = reason;
    this.retryable = code === "RemoteQuotaExceeded";
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === "object" && v !== null;

// googleapis (gaxios) puts the HTTP status on `status`, `code` or `response.status`
export function remoteStatusOf(err: unknown): number | undefined {
  if (!isRecord(err)) return undefined;
  const candidates: unknown[] = [err.status, err.code];
  if (isRecord(err.response)) candidates.push(err.response.status);
  for (const c of candidates) {
    if (typeof c === "number" && Number.isInteger(c)) return c;
    if (typeof c === "string" && /^\d{3}$/.test(c)) return Number(c);
  }
  return undefined;
}

const messageOf = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  if (isRecord(err) && typeof err.message === "string") return err.message;
  return String(err);
};

const QUOTA_RE = /quota|rate ?limit|too many requests|resource_exhausted/i;
const CAPACITY_RE = /above the limit of [\d,]+ cells|cell(?:s)? limit|exceeds? (?:the )?(?:maximum|max) (?:number of )?cells/i;

export function classifyRemoteError(err: unknown): SheetSyncError {
  if (err instanceof SheetSyncError) return err;
  const status = remoteStatusOf(err);
  const message = messageOf(err);
  if (status === 429 || QUOTA_RE.test(message)) {
    return new SheetSyncError("RemoteQuotaExceeded", message, { status, cause: err });
  }
  if (CAPACITY_RE.test(message)) {
    return new SheetSyncError("RemoteCapacityExceeded", message, { status, cause: err });
  }
  if (status === 403) {
    return new SheetSyncError("RemotePermissionDenied", message, { status, cause: err });
  }
  return new SheetSyncError("RemoteUnknownError", message, { status, cause: err });
}

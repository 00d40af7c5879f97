import type { ZodIssue } from "zod";

export type KbErrorCode =
  | "index_unavailable"
  | "embedding_failure"
  | "generation_failed"
  | "isolation_violation"
  | "pipeline_timeout"
  | "config_error"
  | "request_validation";

export abstract class KbError extends Error {
  abstract readonly code: KbErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type IndexUnavailableReason = "missing" | "unbuilt" | "fingerprint_mismatch" | "corrupt";

export class IndexUnavailableError extends KbError {
  readonly code = "index_unavailable";
  readonly corpus: string;
  readonly reason: IndexUnavailableReason;
  readonly artifactPath?: string;

  constructor(input: {
    corpus: string;
    reason: IndexUnavailableReason;
    artifactPath?: string;
    detail?: string;
    cause?: unknown;
  }) {
    const where = input.artifactPath ? ` (${input.artifactPath})` : "";
    const detail = input.detail ? `: ${input.detail}` : "";
    super(
      `Index for corpus "${input.corpus}" is unavailable [${input.reason}]${where}${detail}. Rebuild it with 'kb-router build-index ${input.corpus} <sourceDir>'.`,
      { cause: input.cause }
    );
    this.corpus = input.corpus;
    this.reason = input.reason;
    this.artifactPath = input.artifactPath;
  }
}

export class EmbeddingFailureError extends KbError {
  readonly code = "embedding_failure";
  readonly transient: boolean;
  readonly status?: number;

  constructor(message: string, input: { transient: boolean; status?: number; cause?: unknown }) {
    super(message, { cause: input.cause });
    this.transient = input.transient;
    this.status = input.status;
  }
}

export type GenerationFailureKind = "timeout" | "rate_limit" | "auth" | "provider" | "empty";

export class GenerationFailedError extends KbError {
  readonly code = "generation_failed";
  readonly kind: GenerationFailureKind;
  readonly status?: number;

  constructor(message: string, input: { kind: GenerationFailureKind; status?: number; cause?: unknown }) {
    super(message, { cause: input.cause });
    this.kind = input.kind;
    this.status = input.status;
  }
}

/** Raised when a per-user memory search surfaces another user's turn. Indicates a bug. */
export class IsolationViolationError extends KbError {
  readonly code = "isolation_violation";
  readonly expectedUserId: string;
  readonly foundUserId: string;

  constructor(expectedUserId: string, foundUserId: string) {
    super(`Chat memory search for user "${expectedUserId}" returned a turn owned by "${foundUserId}"`);
    this.expectedUserId = expectedUserId;
    this.foundUserId = foundUserId;
  }
}

export class PipelineTimeoutError extends KbError {
  readonly code = "pipeline_timeout";
  readonly deadlineMs: number;

  constructor(deadlineMs: number, cause?: unknown) {
    super(`Request exceeded its ${deadlineMs}ms deadline`, { cause });
    this.deadlineMs = deadlineMs;
  }
}

export class ConfigError extends KbError {
  readonly code = "config_error";
}

export class RequestValidationError extends KbError {
  readonly code = "request_validation";
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    super(`Invalid request: ${issues.map((i) => `${i.path.join(".") || "(root)"} ${i.message}`).join("; ")}`);
    this.issues = issues;
  }
}

export function errorKind(err: unknown): string {
  if (err instanceof GenerationFailedError) return `${err.code}:${err.kind}`;
  if (err instanceof IndexUnavailableError) return `${err.code}:${err.reason}`;
  if (err instanceof KbError) return err.code;
  if (err instanceof Error) return err.name || "Error";
  return "unknown";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

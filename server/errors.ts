import type { TargetLanguage } from "@pali-corpus/corpus-types";

export class PipelineError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }
}

// Provider failures

export class TransientProviderError extends PipelineError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super("transient_provider", message, options);
    this.name = "TransientProviderError";
    this.status = status;
  }
}

export class QuotaExceededError extends PipelineError {
  readonly retryAfterMs: number | null;

  constructor(message: string, retryAfterMs: number | null = null, options?: { cause?: unknown }) {
    super("quota_exceeded", message, options);
    this.name = "QuotaExceededError";
    this.retryAfterMs = retryAfterMs;
  }
}

export type ProviderError = TransientProviderError | QuotaExceededError;

// Sanitizer failures. Recorded per unit for manual review, never fatal.

export class ValidationError extends PipelineError {
  readonly language: TargetLanguage;

  constructor(code: string, language: TargetLanguage, message: string) {
    super(code, message);
    this.name = "ValidationError";
    this.language = language;
  }
}

export interface ForeignCharacterIssue {
  char: string;
  codePoint: string;
  script: string;
  position: number;
  context: string;
}

export class ForeignCharacterError extends ValidationError {
  readonly issues: ForeignCharacterIssue[];
  readonly scriptRatio: number;

  constructor(
    language: TargetLanguage,
    message: string,
    details: { issues?: ForeignCharacterIssue[]; scriptRatio: number },
  ) {
    super("foreign_characters", language, message);
    this.name = "ForeignCharacterError";
    this.issues = details.issues ?? [];
    this.scriptRatio = details.scriptRatio;
  }
}

export class OverExpansionError extends ValidationError {
  readonly sourceLength: number;
  readonly outputLength: number;
  readonly limit: number;

  constructor(
    language: TargetLanguage,
    details: { sourceLength: number; outputLength: number; limit: number },
  ) {
    super(
      "over_expansion",
      language,
      `Output of ${details.outputLength} chars exceeds limit ${details.limit} for a ${details.sourceLength}-char source.`,
    );
    this.name = "OverExpansionError";
    this.sourceLength = details.sourceLength;
    this.outputLength = details.outputLength;
    this.limit = details.limit;
  }
}

export class ArtifactEncodingError extends ValidationError {
  readonly artifact: string;

  constructor(language: TargetLanguage, artifact: string, message: string) {
    super("artifact_encoding", language, message);
    this.name = "ArtifactEncodingError";
    this.artifact = artifact;
  }
}

export class EmptyTranslationError extends ValidationError {
  constructor(language: TargetLanguage) {
    super("empty_translation", language, "Output is empty after cleanup.");
    this.name = "EmptyTranslationError";
  }
}

// Merge and structure

export class OverwriteConflictError extends PipelineError {
  readonly language: TargetLanguage;
  readonly conflictingLocations: string[];

  constructor(language: TargetLanguage, conflictingLocations: string[]) {
    super(
      "overwrite_conflict",
      `Refusing to overwrite existing ${language} text at ${conflictingLocations.join(", ")}.`,
    );
    this.name = "OverwriteConflictError";
    this.language = language;
    this.conflictingLocations = conflictingLocations;
  }
}

export class TreeIntegrityError extends PipelineError {
  readonly location: string | null;

  constructor(message: string, location: string | null = null) {
    super("tree_integrity", message);
    this.name = "TreeIntegrityError";
    this.location = location;
  }
}

export type MergeError = OverwriteConflictError | TreeIntegrityError;

// Session

export class SessionLockedError extends PipelineError {
  readonly owner: string | null;
  readonly heartbeatAt: string | null;

  /** A null owner means the lock this session held is gone. */
  constructor(owner: string | null, heartbeatAt: string | null) {
    super(
      "session_locked",
      owner === null
        ? "Checkpoint lock is no longer held by this session."
        : `Checkpoint is locked by ${owner} (last heartbeat ${heartbeatAt ?? "unknown"}).`,
    );
    this.name = "SessionLockedError";
    this.owner = owner;
    this.heartbeatAt = heartbeatAt;
  }
}

export class IllegalTransitionError extends PipelineError {
  constructor(from: string, event: string) {
    super("illegal_transition", `Cannot ${event} from state ${from}.`);
    this.name = "IllegalTransitionError";
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string) {
    super("configuration", message);
    this.name = "ConfigurationError";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

import type { z } from 'zod';

const SNIPPET_LENGTH = 300;

function snippet(raw: string): string {
  return raw.length > SNIPPET_LENGTH ? `${raw.slice(0, SNIPPET_LENGTH)}…` : raw;
}

// ─── Structured-output extraction ────────────────────────────────────

export type StructuredOutputErrorKind =
  | 'no_structured_data'
  | 'malformed'
  | 'decode'
  | 'schema';

/**
 * Base class for every failure of the structured-output extractor.
 * `rawSnippet` holds the head of the generated text for diagnostics.
 */
export abstract class StructuredOutputError extends Error {
  abstract readonly kind: StructuredOutputErrorKind;
  readonly rawSnippet: string;

  constructor(message: string, raw: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.rawSnippet = snippet(raw);
  }
}

export class NoStructuredDataFoundError extends StructuredOutputError {
  readonly kind = 'no_structured_data' as const;

  constructor(raw: string) {
    super('No JSON object found in generated text', raw);
  }
}

export class MalformedStructuredDataError extends StructuredOutputError {
  readonly kind = 'malformed' as const;

  constructor(raw: string, readonly openDepth: number) {
    super(`Unbalanced braces in generated text (${openDepth} left open)`, raw);
  }
}

export class DecodeError extends StructuredOutputError {
  readonly kind = 'decode' as const;

  constructor(raw: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Generated text is not valid JSON: ${detail}`, raw, { cause });
  }
}

export class SchemaValidationError extends StructuredOutputError {
  readonly kind = 'schema' as const;

  constructor(raw: string, readonly issues: z.ZodIssue[]) {
    super(`Generated data failed schema validation: ${formatIssues(issues)}`, raw);
  }
}

export function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .slice(0, 5)
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

// ─── Domain records ──────────────────────────────────────────────────

/** A record factory was handed values that break the record's invariants. */
export class DomainValidationError extends Error {
  constructor(readonly entity: string, readonly issues: z.ZodIssue[]) {
    super(`Invalid ${entity}: ${formatIssues(issues)}`);
    this.name = 'DomainValidationError';
  }
}

// ─── Pipeline ────────────────────────────────────────────────────────

/**
 * Raised by the orchestrator when a transition is requested out of order.
 * Thrown before any generation call is made.
 */
export class PreconditionError extends Error {
  constructor(
    readonly step: string,
    readonly state: string,
    readonly requirement: string,
  ) {
    super(`Cannot run ${step} in state ${state}: ${requirement}`);
    this.name = 'PreconditionError';
  }
}

export type StageName =
  | 'profile_extraction'
  | 'opportunity_discovery'
  | 'fit_scoring'
  | 'strategic_ranking'
  | 'report';

/**
 * Stage-level failure. Wraps the underlying extractor or collaborator error
 * with the stage that produced it.
 */
export class StageError extends Error {
  constructor(readonly stage: StageName, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StageError';
  }
}

// ─── Collaborators ───────────────────────────────────────────────────

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[] | string[]) {
    const lines = issues.map((issue) => (typeof issue === 'string' ? issue : formatIssues([issue])));
    super(`Invalid configuration: ${lines.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export type ResumeExtractionErrorCode = 'unsupported_format' | 'unreadable' | 'too_large' | 'empty';

export class ResumeExtractionError extends Error {
  constructor(readonly code: ResumeExtractionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResumeExtractionError';
  }
}

export class JobSearchError extends Error {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JobSearchError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ============================================================================
// covenant-pathways — Error Types
// ============================================================================

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

/** Base class of every error raised by this library. */
export class PathwayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Pathways: ${message}`, options);
    this.name = 'PathwayError';
  }
}

// ---------------------------------------------------------------------------
// Declaration
// ---------------------------------------------------------------------------

/**
 * A contract type was declared inconsistently: a duplicate name, a reference
 * to a guard or compile gate that was never declared, or an updatable
 * pathway without a shared argument envelope.
 *
 * Raised while the contract is declared: by the `ContractBuilder` call that
 * introduces the inconsistency, or by `build()` for a missing envelope. An
 * inconsistent contract type never exists at run time.
 */
export class DeclarationError extends PathwayError {
  constructor(
    public readonly contract: string,
    public readonly detail: string,
  ) {
    super(`contract "${contract}" is declared inconsistently: ${detail}`);
    this.name = 'DeclarationError';
  }
}

// ---------------------------------------------------------------------------
// Coercion
// ---------------------------------------------------------------------------

/** A single reason an external argument was rejected. */
export interface CoercionIssue {
  /** Dotted path to the offending field (`""` for the root value). */
  path: string;
  message: string;
}

/**
 * An external argument could not be converted into the typed parameter of
 * an updatable pathway.
 *
 * Usually returned inside a {@link CoercionResult}; only
 * `UpdatablePathway.call()` throws it.
 */
export class CoercionError extends PathwayError {
  constructor(
    public readonly argument: string,
    public readonly issues: readonly CoercionIssue[],
  ) {
    super(`cannot coerce argument "${argument}": ${formatIssues(issues)}`);
    this.name = 'CoercionError';
  }
}

/** Outcome of coercing an external value into a typed argument. */
export type CoercionResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: CoercionError };

function formatIssues(issues: readonly CoercionIssue[]): string {
  if (issues.length === 0) return 'no details';
  return issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join('; ');
}

// ---------------------------------------------------------------------------
// Schema generation
// ---------------------------------------------------------------------------

/** The structural schema of an argument type could not be generated. */
export class SchemaGenerationError extends PathwayError {
  constructor(
    public readonly argument: string,
    cause: unknown,
  ) {
    super(
      `cannot generate a schema for argument "${argument}" — ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = 'SchemaGenerationError';
  }
}

// ---------------------------------------------------------------------------
// Compilation
// ---------------------------------------------------------------------------

/**
 * Raised from pathway bodies and context helpers while the external compiler
 * walks a contract, e.g. when a template spends more than the context holds.
 */
export class CompilationError extends PathwayError {
  constructor(
    message: string,
    public readonly path: readonly string[] = [],
  ) {
    super(path.length > 0 ? `${message} (at ${path.join('/')})` : message);
    this.name = 'CompilationError';
  }
}

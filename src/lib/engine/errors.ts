// ============================================================
// Merge Errors — every detected inconsistency aborts the run
// ============================================================

export type MergeErrorCode =
  | 'UNSUPPORTED_FEATURE'
  | 'LIBRARY_CONFLICT'
  | 'DESIGN_RULE_MISMATCH'
  | 'SECTION_CONFLICT'
  | 'UNRESOLVED_REFERENCE';

export abstract class MergeError extends Error {
  abstract readonly code: MergeErrorCode;
  /** Input the error was raised for; set by the orchestrator */
  source?: string;

  /** Attach the failing input. The first attached source is kept. */
  withSource(source: string): this {
    if (this.source === undefined) this.source = source;
    return this;
  }

  /** One-line diagnostic naming the failing input and the conflict */
  describe(): string {
    return this.source ? `${this.source}: ${this.message}` : this.message;
  }
}

export class UnsupportedFeatureError extends MergeError {
  readonly code = 'UNSUPPORTED_FEATURE';

  constructor(
    readonly construct: string,
    detail: string,
  ) {
    super(`Unsupported construct ${construct || '(document)'}: ${detail}`);
    this.name = 'UnsupportedFeatureError';
  }
}

export class LibraryConflictError extends MergeError {
  readonly code = 'LIBRARY_CONFLICT';

  constructor(
    readonly library: string,
    readonly packageName: string | undefined,
    /** First point where the two definitions diverge */
    readonly path: string,
    readonly existing: unknown,
    readonly incoming: unknown,
  ) {
    super(
      `Conflicting definitions of ${describeEntity(library, packageName)} at ${path || '(root)'}: ` +
      `${formatValue(existing)} != ${formatValue(incoming)}`,
    );
    this.name = 'LibraryConflictError';
  }
}

export class DesignRuleMismatchError extends MergeError {
  readonly code = 'DESIGN_RULE_MISMATCH';

  constructor(readonly parameters: string[]) {
    super(`Design rules must be equivalent; differing parameters: ${parameters.join(', ')}`);
    this.name = 'DesignRuleMismatchError';
  }
}

export type BoardSection = 'version' | 'attributes' | 'variantDefs' | 'classes';

export class SectionConflictError extends MergeError {
  readonly code = 'SECTION_CONFLICT';

  constructor(
    readonly section: BoardSection,
    readonly path: string,
    readonly existing: unknown,
    readonly incoming: unknown,
  ) {
    super(
      `Unsupported difference in ${section}${path ? ` at ${path}` : ''}: ` +
      `${formatValue(existing)} != ${formatValue(incoming)}`,
    );
    this.name = 'SectionConflictError';
  }
}

export class UnresolvedReferenceError extends MergeError {
  readonly code = 'UNRESOLVED_REFERENCE';

  constructor(
    readonly element: string,
    readonly library: string,
    readonly packageName: string,
  ) {
    super(`Element ${element} references package ${packageName} of library ${library}, which the board does not define`);
    this.name = 'UnresolvedReferenceError';
  }
}

function describeEntity(library: string, packageName: string | undefined): string {
  return packageName ? `package ${packageName} of library ${library}` : `library ${library}`;
}

function formatValue(value: unknown): string {
  if (value === undefined) return '(missing)';
  const text = JSON.stringify(value);
  return text.length > 120 ? `${text.slice(0, 117)}...` : text;
}

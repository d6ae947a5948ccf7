/**
 * Error taxonomy for schema validation.
 *
 * Violations are plain data collected during a single traversal. The Error
 * subclasses below are what callers see when something is thrown.
 */

export type PathSegment = string | number;

export type Cardinality = "exactly_one" | "at_most_one" | "at_least_one";

export type ViolationKind =
  | "MissingRequired"
  | "TypeMismatch"
  | "PatternMismatch"
  | "RangeViolation"
  | "DuplicateItems"
  | "UnknownField"
  | "ExclusivityViolation"
  | "RuleViolation";

interface ViolationBase {
  readonly path: readonly PathSegment[];
  readonly detail: string;
}

export interface MissingRequiredViolation extends ViolationBase {
  readonly kind: "MissingRequired";
}

export interface TypeMismatchViolation extends ViolationBase {
  readonly kind: "TypeMismatch";
  readonly expected: string;
}

export interface PatternMismatchViolation extends ViolationBase {
  readonly kind: "PatternMismatch";
  readonly pattern: string;
}

export interface RangeViolation extends ViolationBase {
  readonly kind: "RangeViolation";
  /** What was measured: the number itself, a string's length or a list's item count. */
  readonly measure: "value" | "length" | "items";
  readonly min?: number;
  readonly max?: number;
}

export interface DuplicateItemsViolation extends ViolationBase {
  readonly kind: "DuplicateItems";
  readonly duplicates: readonly unknown[];
}

export interface UnknownFieldViolation extends ViolationBase {
  readonly kind: "UnknownField";
}

export interface ExclusivityViolation extends ViolationBase {
  readonly kind: "ExclusivityViolation";
  readonly cardinality: Cardinality;
  readonly members: readonly string[];
  /** Members found in the input; empty when none were supplied. */
  readonly present: readonly string[];
}

export interface RuleViolation extends ViolationBase {
  readonly kind: "RuleViolation";
  readonly rule: string;
}

export type Violation =
  | MissingRequiredViolation
  | TypeMismatchViolation
  | PatternMismatchViolation
  | RangeViolation
  | DuplicateItemsViolation
  | UnknownFieldViolation
  | ExclusivityViolation
  | RuleViolation;

/** Ordered list of violations from one validation run. */
export type ValidationErrorReport = readonly Violation[];

export function formatPath(path: readonly PathSegment[]): string {
  if (path.length === 0) {
    return "<root>";
  }
  return path
    .map((segment, i) => (typeof segment === "number" ? `[${segment}]` : i === 0 ? segment : `.${segment}`))
    .join("");
}

/**
 * Render a report as one line per violation: `path: Kind: detail`.
 */
export function formatViolations(report: ValidationErrorReport): string {
  return report.map((v) => `${formatPath(v.path)}: ${v.kind}: ${v.detail}`).join("\n");
}

/**
 * A schema declaration is inconsistent (bad field options, unknown group
 * member, alias collision, ...). Raised while the catalog is being built.
 */
export class SchemaDefinitionError extends Error {
  constructor(
    message: string,
    public readonly schemaName: string,
  ) {
    super(`${schemaName}: ${message}`);
    this.name = "SchemaDefinitionError";
  }
}

export class DuplicateSchemaError extends Error {
  constructor(public readonly schemaName: string) {
    super(`Schema '${schemaName}' is already registered with a different definition`);
    this.name = "DuplicateSchemaError";
  }
}

export class UnknownSchemaError extends Error {
  constructor(
    public readonly schemaName: string,
    public readonly known: readonly string[] = [],
  ) {
    super(`Schema '${schemaName}' is not registered`);
    this.name = "UnknownSchemaError";
  }
}

export class RegistrySealedError extends Error {
  constructor(public readonly schemaName: string) {
    super(`Cannot register '${schemaName}': the schema registry is sealed`);
    this.name = "RegistrySealedError";
  }
}

/**
 * Thrown by `parseTree` when an input fails validation. Carries the complete
 * report, never only the first violation.
 */
export class SchemaValidationError extends Error {
  constructor(
    public readonly schemaName: string,
    public readonly violations: ValidationErrorReport,
  ) {
    super(
      `${schemaName} failed validation with ${violations.length} violation(s):\n${formatViolations(violations)}`,
    );
    this.name = "SchemaValidationError";
  }

  format(): string {
    return formatViolations(this.violations);
  }

  /** Violations of one kind, in report order. */
  ofKind<K extends ViolationKind>(kind: K): Extract<Violation, { kind: K }>[] {
    return this.violations.filter((v): v is Extract<Violation, { kind: K }> => v.kind === kind);
  }
}

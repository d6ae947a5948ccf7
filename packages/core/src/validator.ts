/**
 * Tree Validator
 *
 * Walks a node schema depth-first against a raw mapping. Violations from the
 * whole tree are collected in one pass (or the walk stops at the first one
 * under the `fail_fast` policy). A tree is produced only when nothing was
 * reported.
 */

import { validateValidatorConfig } from "./config";
import type { ErrorPolicy, ValidatorConfig, ValidatorConfigInput } from "./config";
import { DEFAULT_ERROR_POLICY } from "./constants";
import { SchemaValidationError } from "./errors";
import type { PathSegment, ValidationErrorReport, Violation } from "./errors";
import { evaluateExclusivity } from "./exclusivity";
import { evaluateField } from "./field-constraint";
import type { EvaluationContext } from "./field-constraint";
import { createConsoleLogger, silentLogger } from "./logger";
import type { ValidatorLogger } from "./logger";
import type { NodeSchema } from "./node-schema";
import { defaultRegistry } from "./registry";
import type { SchemaRegistry } from "./registry";
import { serializeTree } from "./serializer";
import type { SerializeOptions } from "./serializer";
import { ValidatedTree, isPlainObject } from "./tree";
import type { JsonObject, TreeValue } from "./tree";

export type ValidationResult =
  | { readonly success: true; readonly tree: ValidatedTree }
  | { readonly success: false; readonly report: ValidationErrorReport };

export interface ValidateOptions {
  readonly errorPolicy?: ErrorPolicy;
  readonly logger?: ValidatorLogger;
}

/**
 * One validation run. Owns its report; nothing here is shared between runs.
 */
class Traversal implements EvaluationContext {
  readonly violations: Violation[] = [];
  /** Set while inside a node whose policy is `ignore`; inherited by its descendants. */
  private lenient = false;

  constructor(
    private readonly failFast: boolean,
    private readonly logger: ValidatorLogger,
  ) {}

  get halted(): boolean {
    return this.failFast && this.violations.length > 0;
  }

  report(violation: Violation): void {
    if (!this.halted) {
      this.violations.push(violation);
    }
  }

  visitNode(
    schema: NodeSchema,
    raw: Record<string, unknown>,
    path: readonly PathSegment[],
  ): ValidatedTree | undefined {
    const outer = this.lenient;
    this.lenient = outer || schema.extraPolicy === "ignore";
    try {
      return this.walk(schema, raw, path);
    } finally {
      this.lenient = outer;
    }
  }

  private walk(
    schema: NodeSchema,
    raw: Record<string, unknown>,
    path: readonly PathSegment[],
  ): ValidatedTree | undefined {
    const before = this.violations.length;

    // Map input keys (canonical or alias) onto declared fields
    const supplied = new Map<string, unknown>();
    const spelledAs = new Map<string, string>();
    for (const [key, value] of Object.entries(raw)) {
      const canonical = schema.inputNames.get(key);
      if (canonical === undefined) {
        if (this.lenient) {
          this.logger.debug(`${schema.name}: dropping unknown key '${key}'`);
        } else {
          this.report({
            kind: "UnknownField",
            path: [...path, key],
            detail: `'${key}' is not a field of ${schema.name}`,
          });
        }
        continue;
      }
      if (value === undefined || value === null) {
        continue;
      }
      const previous = spelledAs.get(canonical);
      if (previous !== undefined) {
        const alias = schema.fields.get(canonical)?.alias ?? key;
        this.report({
          kind: "ExclusivityViolation",
          path: [...path, canonical],
          cardinality: "at_most_one",
          members: [canonical, alias],
          present: [previous, key],
          detail: `supplied as both '${previous}' and '${key}'`,
        });
        continue;
      }
      spelledAs.set(canonical, key);
      supplied.set(canonical, value);
    }
    if (this.halted) return undefined;

    const values = new Map<string, TreeValue>();
    const explicit = new Set<string>();
    const present = new Set<string>();
    for (const [name, spec] of schema.fields) {
      const rawValue = supplied.get(name);
      if (rawValue !== undefined && rawValue !== null) {
        present.add(name);
      }
      const outcome = evaluateField(spec, rawValue, [...path, name], this);
      if (this.halted) return undefined;
      if (outcome.status === "ok") {
        values.set(name, outcome.value);
        if (outcome.explicit) explicit.add(name);
      }
    }

    for (const group of schema.exclusivityGroups) {
      const violation = evaluateExclusivity(group, present, path);
      if (violation !== undefined) {
        this.report(violation);
        if (this.halted) return undefined;
      }
    }

    if (this.violations.length > before) {
      return undefined;
    }

    const tree = new ValidatedTree(schema, values, explicit);
    for (const rule of schema.rules) {
      const message = rule.check(tree);
      if (message !== undefined) {
        this.report({
          kind: "RuleViolation",
          rule: rule.id,
          path: rule.field === undefined ? path : [...path, rule.field],
          detail: message,
        });
        if (this.halted) return undefined;
      }
    }
    return this.violations.length > before ? undefined : tree;
  }
}

/**
 * Validate a raw mapping against a schema.
 *
 * @returns the tree on success, otherwise the complete violation report
 */
export function validateTree(
  schema: NodeSchema,
  input: unknown,
  options: ValidateOptions = {},
): ValidationResult {
  const logger = options.logger ?? silentLogger;
  const traversal = new Traversal((options.errorPolicy ?? DEFAULT_ERROR_POLICY) === "fail_fast", logger);

  let tree: ValidatedTree | undefined;
  if (isPlainObject(input)) {
    tree = traversal.visitNode(schema, input, []);
  } else {
    traversal.report({
      kind: "TypeMismatch",
      path: [],
      expected: "object",
      detail: `${schema.name} expects an object, received ${Array.isArray(input) ? "list" : input === null ? "null" : typeof input}`,
    });
  }

  if (tree !== undefined && traversal.violations.length === 0) {
    logger.debug(`${schema.name}: valid`);
    return { success: true, tree };
  }
  logger.debug(`${schema.name}: ${traversal.violations.length} violation(s)`);
  return { success: false, report: Object.freeze([...traversal.violations]) };
}

/**
 * Validate and return the tree.
 *
 * @throws SchemaValidationError carrying every violation found
 */
export function parseTree(schema: NodeSchema, input: unknown, options: ValidateOptions = {}): ValidatedTree {
  const result = validateTree(schema, input, options);
  if (!result.success) {
    throw new SchemaValidationError(schema.name, result.report);
  }
  return result.tree;
}

export interface TreeValidatorOptions {
  readonly registry?: SchemaRegistry;
  readonly config?: ValidatorConfigInput;
  readonly logger?: ValidatorLogger;
}

/**
 * Validator bound to a registry and a configuration. Schemas may be passed
 * directly or by registered name.
 */
export class TreeValidator {
  readonly config: ValidatorConfig;
  private readonly registry: SchemaRegistry;
  private readonly logger: ValidatorLogger;

  constructor(options: TreeValidatorOptions = {}) {
    this.config = validateValidatorConfig(options.config ?? {});
    this.registry = options.registry ?? defaultRegistry;
    this.logger = options.logger ?? createConsoleLogger(this.config.logLevel);
  }

  private schemaOf(schema: NodeSchema | string): NodeSchema {
    return typeof schema === "string" ? this.registry.resolve(schema) : schema;
  }

  validate(schema: NodeSchema | string, input: unknown): ValidationResult {
    return validateTree(this.schemaOf(schema), input, {
      errorPolicy: this.config.errorPolicy,
      logger: this.logger,
    });
  }

  parse(schema: NodeSchema | string, input: unknown): ValidatedTree {
    return parseTree(this.schemaOf(schema), input, {
      errorPolicy: this.config.errorPolicy,
      logger: this.logger,
    });
  }

  serialize(tree: ValidatedTree, options: SerializeOptions = {}): JsonObject {
    return serializeTree(tree, { explicitOnly: options.explicitOnly ?? this.config.explicitOnly });
  }
}

/**
 * Node Schema Registry
 *
 * Static catalog of resource schemas keyed by name (`<family>.<Variant>`).
 * Built once at startup, then sealed; after that it is only read, so any
 * number of validations may share it.
 */

import { DuplicateSchemaError, RegistrySealedError, UnknownSchemaError } from "./errors";
import type { NodeSchema } from "./node-schema";
import type { ResourceFamily, SchemaVariant } from "./variants";
import { schemaName } from "./variants";
import { silentLogger } from "./logger";
import type { ValidatorLogger } from "./logger";

export class SchemaRegistry {
  private readonly schemas = new Map<string, NodeSchema>();
  private sealed = false;

  constructor(private readonly logger: ValidatorLogger = silentLogger) {}

  /**
   * Register a schema under its name. Registering the same schema twice is a
   * no-op.
   *
   * @throws DuplicateSchemaError if a different schema already uses the name
   * @throws RegistrySealedError once the registry is sealed
   */
  register(schema: NodeSchema): void {
    const existing = this.schemas.get(schema.name);
    if (existing === schema) {
      return;
    }
    if (this.sealed) {
      throw new RegistrySealedError(schema.name);
    }
    if (existing !== undefined) {
      throw new DuplicateSchemaError(schema.name);
    }
    this.schemas.set(schema.name, schema);
    this.logger.debug(`registered schema ${schema.name}`);
  }

  /** Register all four variants of a family. */
  registerFamily(family: ResourceFamily): void {
    for (const schema of [family.Base, family.Create, family.Update, family.Response]) {
      this.register(schema);
    }
  }

  /**
   * @throws UnknownSchemaError if nothing is registered under the name
   */
  resolve(name: string): NodeSchema {
    const schema = this.schemas.get(name);
    if (schema === undefined) {
      throw new UnknownSchemaError(name, this.getSchemaNames());
    }
    return schema;
  }

  resolveVariant(family: string, variant: SchemaVariant): NodeSchema {
    return this.resolve(schemaName(family, variant));
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  getSchemaNames(): string[] {
    return Array.from(this.schemas.keys()).sort();
  }

  /** Families with at least one registered variant. */
  getFamilies(): string[] {
    const families = new Set<string>();
    for (const name of this.schemas.keys()) {
      const dot = name.lastIndexOf(".");
      families.add(dot === -1 ? name : name.slice(0, dot));
    }
    return Array.from(families).sort();
  }

  /** Make the registry read-only. */
  seal(): this {
    this.sealed = true;
    this.logger.debug(`schema registry sealed with ${this.schemas.size} schema(s)`);
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.schemas.size;
  }
}

/**
 * Default global registry instance.
 */
export const defaultRegistry = new SchemaRegistry();

/**
 * Constants module for @netschema/core.
 */

export * from "./defaults";

/**
 * Validator default configuration values.
 */

// Error reporting
export const DEFAULT_ERROR_POLICY = "aggregate";

// Serialization: send only what the caller set
export const DEFAULT_EXPLICIT_ONLY = true;

// Logging defaults
export const DEFAULT_LOG_LEVEL = "warn";
export const LOG_PREFIX = "[netschema]";

// Environment variables read by loadValidatorConfig()
export const ENV_ERROR_POLICY = "NETSCHEMA_ERROR_POLICY";
export const ENV_LOG_LEVEL = "NETSCHEMA_LOG_LEVEL";
export const ENV_EXPLICIT_ONLY = "NETSCHEMA_EXPLICIT_ONLY";

// Container fields shared by every resource family
export const CONTAINER_NAME_PATTERN = "[a-zA-Z\\d\\-_. ]+";
export const CONTAINER_NAME_MAX_LENGTH = 64;

// Canonical 8-4-4-4-12 hex UUID
export const UUID_PATTERN = "[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}";

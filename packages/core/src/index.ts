export * from "./errors";
export * from "./tree";
export * from "./field-constraint";
export * from "./exclusivity";
export * from "./node-schema";
export * from "./variants";
export * from "./registry";
export * from "./validator";
export * from "./serializer";
export * from "./config";
export * from "./logger";
export * from "./constants";

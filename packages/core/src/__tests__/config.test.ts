import { describe, it, expect, vi, afterEach } from "vitest";
import { ZodError } from "zod";
import { loadValidatorConfig, validateValidatorConfig } from "../config";
import { createConsoleLogger, silentLogger } from "../logger";

describe("validateValidatorConfig", () => {
  it("fills in defaults", () => {
    expect(validateValidatorConfig({})).toEqual({
      errorPolicy: "aggregate",
      logLevel: "warn",
      explicitOnly: true,
    });
  });

  it("rejects an unknown error policy", () => {
    expect(() => validateValidatorConfig({ errorPolicy: "sometimes" })).toThrow(ZodError);
  });
});

describe("loadValidatorConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadValidatorConfig({})).toEqual({ errorPolicy: "aggregate", logLevel: "warn", explicitOnly: true });
  });

  it("reads every variable", () => {
    expect(
      loadValidatorConfig({
        NETSCHEMA_ERROR_POLICY: "fail_fast",
        NETSCHEMA_LOG_LEVEL: "DEBUG",
        NETSCHEMA_EXPLICIT_ONLY: "no",
      }),
    ).toEqual({ errorPolicy: "fail_fast", logLevel: "debug", explicitOnly: false });
  });

  it("treats empty variables as unset", () => {
    expect(loadValidatorConfig({ NETSCHEMA_ERROR_POLICY: "", NETSCHEMA_EXPLICIT_ONLY: "" }).errorPolicy).toBe(
      "aggregate",
    );
  });

  it("rejects malformed values", () => {
    expect(() => loadValidatorConfig({ NETSCHEMA_EXPLICIT_ONLY: "maybe" })).toThrow(ZodError);
    expect(() => loadValidatorConfig({ NETSCHEMA_LOG_LEVEL: "loud" })).toThrow(ZodError);
  });
});

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages at or above its level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const logger = createConsoleLogger("warn");
    logger.warn("catalog incomplete", 3);
    logger.info("not shown");
    expect(warn).toHaveBeenCalledWith("[netschema]", "catalog incomplete", 3);
    expect(info).not.toHaveBeenCalled();
  });

  it("accepts a custom prefix", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    createConsoleLogger("debug", "[test]").debug("hello");
    expect(debug).toHaveBeenCalledWith("[test]", "hello");
  });

  it("stays quiet when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    silentLogger.error("nothing");
    expect(error).not.toHaveBeenCalled();
  });
});
